import {
  ScheduledEmailStatus,
  type EmailConfigData,
  type InsertScheduledEmail,
  type ScheduledEmail,
} from "@shared/schema";
import { addDaysToDateString, combineDateAndTime, normalizeTime, toDateString } from "@shared/utils";

export type ScheduleWindow =
  | { kind: "single"; date: string }
  | { kind: "range"; from: string; to: string }
  | { kind: "all" };

/**
 * An enabled service entry that passed validation.
 */
export interface ServiceSchedule {
  serviceId: string;
  templateId: number;
  templateName: string;
  window: ScheduleWindow;
  times: string[];
}

/**
 * Addresses subscribed to `templateId`, in configuration order.
 */
export function recipientsForTemplate(config: EmailConfigData, templateId: number): string[] {
  return Object.entries(config.emailTemplates)
    .filter(([, recipient]) => recipient.selectedTemplates.includes(templateId))
    .map(([email]) => email);
}

function buildRow(
  clientId: number,
  templateId: number | null,
  recipientEmails: string[],
  scheduledDate: string,
  scheduledTime: string,
  isRecurring: boolean,
  recurrenceEndDate: string | null,
): InsertScheduledEmail {
  return {
    clientId,
    templateId,
    recipientEmails: [...recipientEmails],
    scheduledDate,
    scheduledTime,
    scheduledDatetime: combineDateAndTime(scheduledDate, scheduledTime),
    status: ScheduledEmailStatus.PENDING,
    isRecurring,
    recurrenceEndDate,
  };
}

/**
 * Turns one service schedule into pending rows. "all" schedules start
 * tomorrow and carry themselves forward one day at a time after each send.
 */
export function expandServiceSchedule(
  config: EmailConfigData,
  clientId: number,
  schedule: ServiceSchedule,
  now: Date,
): InsertScheduledEmail[] {
  const recipients = recipientsForTemplate(config, schedule.templateId);
  if (recipients.length === 0) {
    return [];
  }

  const times = schedule.times.map(normalizeTime);
  const { window } = schedule;

  switch (window.kind) {
    case "single":
      return times.map((time) => buildRow(clientId, schedule.templateId, recipients, window.date, time, false, null));

    case "range": {
      const rows: InsertScheduledEmail[] = [];
      for (let day = window.from; day <= window.to; day = addDaysToDateString(day, 1)) {
        for (const time of times) {
          rows.push(buildRow(clientId, schedule.templateId, recipients, day, time, false, window.to));
        }
      }
      return rows;
    }

    case "all": {
      const tomorrow = addDaysToDateString(toDateString(now), 1);
      return times.map((time) => buildRow(clientId, schedule.templateId, recipients, tomorrow, time, true, null));
    }
  }
}

/**
 * The row that keeps a recurring schedule alive after `row` was sent, or
 * null once the end date is reached.
 */
export function nextOccurrence(row: ScheduledEmail): InsertScheduledEmail | null {
  if (!row.isRecurring) {
    return null;
  }

  const endDate = row.recurrenceEndDate;
  if (endDate && row.scheduledDate >= endDate) {
    return null;
  }

  const nextDate = addDaysToDateString(row.scheduledDate, 1);
  if (endDate && nextDate > endDate) {
    return null;
  }

  return buildRow(
    row.clientId,
    row.templateId,
    row.recipientEmails,
    nextDate,
    normalizeTime(row.scheduledTime),
    true,
    endDate,
  );
}

/**
 * Whether the scheduler should pick `row` up at `now`.
 */
export function isDue(row: ScheduledEmail, now: Date): boolean {
  if (row.status !== ScheduledEmailStatus.PENDING) return false;
  if (row.scheduledDatetime.getTime() > now.getTime()) return false;
  if (!row.isRecurring || !row.recurrenceEndDate) return true;
  return row.recurrenceEndDate >= toDateString(now);
}
