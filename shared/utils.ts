import { addDays, format, isValid, parse } from "date-fns";

const DATE_FORMAT = "yyyy-MM-dd";
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Formats a Date as a local calendar day (YYYY-MM-DD).
 */
export function toDateString(value: Date): string {
  return format(value, DATE_FORMAT);
}

export function isValidDateString(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = parse(value, DATE_FORMAT, new Date());
  return isValid(parsed) && format(parsed, DATE_FORMAT) === value;
}

/**
 * Checks a 24-hour HH:mm time.
 */
export function isValidTimeString(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/**
 * Postgres hands `time` columns back as HH:mm:ss; everything above the
 * storage layer works with HH:mm.
 */
export function normalizeTime(value: string): string {
  return value.slice(0, 5);
}

export function addDaysToDateString(value: string, days: number): string {
  return toDateString(addDays(parse(value, DATE_FORMAT, new Date()), days));
}

/**
 * Builds the local timestamp a scheduled email becomes due at.
 */
export function combineDateAndTime(dateValue: string, timeValue: string): Date {
  return parse(`${dateValue} ${normalizeTime(timeValue)}`, `${DATE_FORMAT} HH:mm`, new Date());
}

/**
 * Inclusive list of calendar days between two YYYY-MM-DD strings.
 */
export function eachDateString(from: string, to: string): string[] {
  const days: string[] = [];
  let current = from;
  // YYYY-MM-DD strings sort chronologically
  while (current <= to) {
    days.push(current);
    current = addDaysToDateString(current, 1);
  }
  return days;
}
