import { format, isValid, parse } from 'date-fns';

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Source of the current time. Services take one so that "today" is fixed in tests.
 */
export interface Clock {
  now(): Date;
  today(): string;
}

export const systemClock: Clock = {
  now: () => new Date(),
  today: () => formatCalendarDate(new Date()),
};

export function fixedClock(now: Date): Clock {
  return {
    now: () => new Date(now.getTime()),
    today: () => formatCalendarDate(now),
  };
}

export function formatCalendarDate(date: Date): string {
  return format(date, CALENDAR_DATE_FORMAT);
}

/**
 * True for a real calendar day written as YYYY-MM-DD ("2025-02-30" is rejected).
 */
export function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = parse(value, CALENDAR_DATE_FORMAT, new Date());
  return isValid(parsed) && formatCalendarDate(parsed) === value;
}

/**
 * Orders two YYYY-MM-DD dates. The format sorts lexicographically.
 */
export function compareCalendarDates(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Midnight local time on the given YYYY-MM-DD day.
 */
export function parseCalendarDate(value: string): Date {
  return parse(value, CALENDAR_DATE_FORMAT, new Date());
}
