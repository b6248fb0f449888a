import type { Response } from "express";
import type { ZodError, ZodTypeAny, output } from "zod";

export type FieldErrors = Record<string, string[]>;

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = "BadRequestError";
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Access denied") {
    super(403, message);
    this.name = "ForbiddenError";
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(503, message, details);
    this.name = "ServiceUnavailableError";
  }
}

/**
 * Rejected input; nothing has been written when this is thrown.
 */
export class ConfigValidationError extends HttpError {
  constructor(public readonly errors: FieldErrors) {
    super(422, "Validation error", errors);
    this.name = "ConfigValidationError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

export function addFieldError(errors: FieldErrors, field: string, message: string) {
  (errors[field] ??= []).push(message);
}

export function zodIssuesToFieldErrors(error: ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    addFieldError(errors, issue.path.length ? issue.path.join(".") : "body", issue.message);
  }
  return errors;
}

/**
 * Translates a thrown error into the JSON response the API returns for it.
 */
export function handleRouteError(res: Response, error: unknown, tag: string) {
  if (error instanceof ConfigValidationError) {
    return res.status(error.status).json({ detail: error.message, errors: error.errors });
  }

  if (error instanceof HttpError) {
    return res.status(error.status).json(
      error.details === undefined ? { error: error.message } : { error: error.message, details: error.details },
    );
  }

  console.error(`[${tag}] Unexpected error:`, error);
  return res.status(500).json({ error: getErrorMessage(error) });
}

/**
 * Parses a request body or query with a zod schema; issues become a 422 keyed by path.
 */
export function parseRequest<S extends ZodTypeAny>(schema: S, input: unknown): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(zodIssuesToFieldErrors(result.error));
  }
  return result.data;
}

export function parseIdParam(value: string, name: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new BadRequestError(`Invalid ${name}`);
  }
  return id;
}
