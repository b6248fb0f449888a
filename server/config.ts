import "dotenv/config";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") return fallback;
      return ["true", "1", "yes", "on"].includes(value.trim().toLowerCase());
    });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: optionalString,
  FRONTEND_URL: optionalString,

  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: optionalString,
  // Hosting dashboards sometimes keep the quotes around pasted passwords
  SMTP_PASSWORD: optionalString.transform((value) => value?.replace(/^["']|["']$/g, "") || undefined),
  SMTP_FROM_EMAIL: optionalString,
  SMTP_FROM_NAME: optionalString.transform((value) => value ?? "Client Services"),
  SMTP_USE_TLS: flag(true),
  SMTP_TIMEOUT: z.coerce.number().positive().default(30),
  SMTP_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SMTP_EMAIL_DELAY: z.coerce.number().min(0).default(1),

  CREDENTIALS_SECRET: optionalString,
  SESSION_SECRET: optionalString,
  EMAIL_SCHEDULER_ENABLED: flag(true),
});

export interface MailSettings {
  host?: string;
  port: number;
  user?: string;
  password?: string;
  fromEmail?: string;
  fromName: string;
  useTls: boolean;
  timeoutSeconds: number;
  retryAttempts: number;
  emailDelaySeconds: number;
}

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  databaseUrl?: string;
  frontendUrl?: string;
  credentialsSecret?: string;
  sessionSecret?: string;
  schedulerEnabled: boolean;
  mail: MailSettings;
}

/**
 * Reads and validates the process environment. Throws with one line per
 * offending variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const lines = result.error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n${lines.join("\n")}`);
  }

  const env = result.data;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    frontendUrl: env.FRONTEND_URL,
    credentialsSecret: env.CREDENTIALS_SECRET,
    sessionSecret: env.SESSION_SECRET,
    schedulerEnabled: env.EMAIL_SCHEDULER_ENABLED,
    mail: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.SMTP_USER,
      password: env.SMTP_PASSWORD,
      fromEmail: env.SMTP_FROM_EMAIL,
      fromName: env.SMTP_FROM_NAME,
      useTls: env.SMTP_USE_TLS,
      timeoutSeconds: env.SMTP_TIMEOUT,
      retryAttempts: env.SMTP_RETRY_ATTEMPTS,
      emailDelaySeconds: env.SMTP_EMAIL_DELAY,
    },
  };
}

/**
 * Names of the SMTP settings that still need a value before mail can go out.
 */
export function getMissingMailSettings(mail: MailSettings): string[] {
  const missing: string[] = [];
  if (!mail.host) missing.push("SMTP_HOST");
  if (!mail.user) missing.push("SMTP_USER");
  if (!mail.password) missing.push("SMTP_PASSWORD");
  if (!mail.fromEmail) missing.push("SMTP_FROM_EMAIL");
  return missing;
}

/**
 * Login page link placed in client emails, or undefined when no frontend is configured.
 */
export function buildLoginUrl(frontendUrl: string | undefined): string | undefined {
  if (!frontendUrl) return undefined;
  return `${frontendUrl.replace(/\/+$/, "")}/login`;
}
