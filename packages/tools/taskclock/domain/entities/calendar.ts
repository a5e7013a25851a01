// Calendar dates - local-time YYYY-MM-DD values without a time of day

/**
 * A local calendar date formatted as `YYYY-MM-DD`.
 * Lexicographic order of two values matches chronological order.
 */
export type CalendarDate = string;

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// Formats a Date into local YYYY-MM-DD (avoids UTC drift around midnight)
export function toCalendarDate(date: Date): CalendarDate {
  const y = date.getFullYear();
  const m = `${date.getMonth() + 1}`.padStart(2, "0");
  const d = `${date.getDate()}`.padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Local midnight of the day containing `date`.
 */
export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/**
 * Check that a string is a real `YYYY-MM-DD` date (rejects 2026-02-30).
 */
export function isCalendarDate(value: string): value is CalendarDate {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);
  return (
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

/**
 * Read the date part of a date or date-time string
 * ("2026-01-14" and "2026-01-14T00:00:00" both give "2026-01-14").
 * Returns null when the leading ten characters are not a valid date.
 */
export function calendarDatePrefix(value: string): CalendarDate | null {
  const prefix = value.slice(0, 10);
  return isCalendarDate(prefix) ? prefix : null;
}
