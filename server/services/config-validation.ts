import { DateType, type EmailConfigData, type ServiceConfig } from "@shared/schema";
import { isValidDateString, isValidTimeString } from "@shared/utils";
import { addFieldError, type FieldErrors } from "../errors";
import type { IStorage } from "../storage";
import type { ScheduleWindow, ServiceSchedule } from "./recurrence";

export type ConfigValidationResult =
  | { ok: true; schedules: ServiceSchedule[] }
  | { ok: false; errors: FieldErrors };

function checkDate(value: string, field: string, errors: string[]): boolean {
  if (!isValidDateString(value)) {
    errors.push(`${field} is not a valid date`);
    return false;
  }
  return true;
}

/**
 * Checks one enabled service entry against `today` (YYYY-MM-DD). Returns the
 * schedule window when the dates are usable, plus every problem found.
 */
export function validateServiceConfig(
  service: ServiceConfig,
  today: string,
): { window: ScheduleWindow | null; errors: string[] } {
  const errors: string[] = [];
  let window: ScheduleWindow | null = null;

  switch (service.dateType) {
    case DateType.SINGLE: {
      if (!service.scheduledDate) {
        errors.push("scheduledDate is required for dateType 'single'");
      } else if (checkDate(service.scheduledDate, "scheduledDate", errors)) {
        if (service.scheduledDate < today) {
          errors.push("scheduledDate cannot be in the past (must be today or later)");
        } else {
          window = { kind: "single", date: service.scheduledDate };
        }
      }
      if (service.scheduledDateFrom || service.scheduledDateTo) {
        errors.push("scheduledDateFrom and scheduledDateTo must be null for dateType 'single'");
      }
      break;
    }

    case DateType.RANGE: {
      const { scheduledDateFrom: from, scheduledDateTo: to } = service;
      if (!from || !to) {
        errors.push("scheduledDateFrom and scheduledDateTo are required for dateType 'range'");
      } else if (checkDate(from, "scheduledDateFrom", errors) && checkDate(to, "scheduledDateTo", errors)) {
        if (from >= to) {
          errors.push("scheduledDateTo must be after scheduledDateFrom");
        } else if (from < today) {
          errors.push("scheduledDateFrom cannot be in the past (must be today or later)");
        } else {
          window = { kind: "range", from, to };
        }
      }
      if (service.scheduledDate) {
        errors.push("scheduledDate must be null for dateType 'range'");
      }
      break;
    }

    case DateType.ALL: {
      if (service.scheduledDate || service.scheduledDateFrom || service.scheduledDateTo) {
        errors.push("All date fields must be null for dateType 'all'");
      } else {
        window = { kind: "all" };
      }
      break;
    }
  }

  if (service.scheduledTimes.length === 0) {
    errors.push("At least one scheduled time must be specified");
  }
  for (const time of service.scheduledTimes) {
    if (!isValidTimeString(time)) {
      errors.push(`Invalid time format: ${time}. Use HH:mm format (24-hour).`);
    }
  }

  return { window, errors };
}

/**
 * Template ids referenced by subscriptions and by enabled services.
 */
export function referencedTemplateIds(config: EmailConfigData): number[] {
  const ids = new Set<number>();
  for (const recipient of Object.values(config.emailTemplates)) {
    recipient.selectedTemplates.forEach((id) => ids.add(id));
  }
  for (const service of Object.values(config.services)) {
    if (service.enabled) ids.add(service.templateId);
  }
  return Array.from(ids).sort((a, b) => a - b);
}

/**
 * Validates a whole configuration document for `orgId`. Either every
 * enabled service yields a schedule or nothing does.
 */
export async function validateEmailConfig(
  config: EmailConfigData,
  orgId: number,
  storage: IStorage,
  today: string,
): Promise<ConfigValidationResult> {
  const errors: FieldErrors = {};

  const templateIds = referencedTemplateIds(config);
  if (templateIds.length > 0) {
    const templates = await storage.getEmailTemplatesByIds(templateIds);
    const byId = new Map(templates.map((template) => [template.id, template]));
    const inaccessible = templateIds.filter((id) => {
      const template = byId.get(id);
      return !template || (template.orgId !== null && template.orgId !== orgId);
    });

    if (inaccessible.length > 0) {
      addFieldError(errors, "templates", `Template IDs not found or not accessible: [${inaccessible.join(", ")}]`);
    }
  }

  const schedules: ServiceSchedule[] = [];
  for (const [serviceId, service] of Object.entries(config.services)) {
    if (!service.enabled) continue;

    const result = validateServiceConfig(service, today);
    result.errors.forEach((message) => addFieldError(errors, `services.${serviceId}`, message));

    if (result.window && result.errors.length === 0) {
      schedules.push({
        serviceId,
        templateId: service.templateId,
        templateName: service.templateName,
        window: result.window,
        times: service.scheduledTimes,
      });
    }
  }

  if (Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, schedules };
}
