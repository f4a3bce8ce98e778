import { ValidationError } from "../errors.js";

function dateParts(date: Date, timeZone: string | undefined, options: Intl.DateTimeFormatOptions): Intl.DateTimeFormatPart[] {
  try {
    return new Intl.DateTimeFormat("en-US", { ...options, timeZone }).formatToParts(date);
  } catch {
    throw new ValidationError(`Invalid timezone: ${timeZone}`);
  }
}

function pick(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
  return parts.find((p) => p.type === type)?.value ?? "";
}

/** Calendar date (YYYY-MM-DD) of `date` as seen in `timeZone`, or in local time. */
export function formatDate(date: Date, timeZone?: string): string {
  const parts = dateParts(date, timeZone, { year: "numeric", month: "2-digit", day: "2-digit" });
  return `${pick(parts, "year")}-${pick(parts, "month")}-${pick(parts, "day")}`;
}

/** HH:MM, 24-hour clock. */
export function formatTime(date: Date, timeZone?: string): string {
  const parts = dateParts(date, timeZone, { hour: "2-digit", minute: "2-digit", hourCycle: "h23" });
  return `${pick(parts, "hour")}:${pick(parts, "minute")}`;
}
