import { z } from 'zod';

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }

  const limit =
    month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1] ?? 0;
  return day <= limit;
}

/**
 * `YYYY-MM-DD`, zero padded: lexical order is chronological order.
 */
export const calendarDateSchema = z
  .string({
    invalid_type_error: 'Date must be a string in YYYY-MM-DD format.',
  })
  .trim()
  .refine(isCalendarDate, {
    message: 'Date must be a valid calendar date in YYYY-MM-DD format.',
  });

export type CalendarDate = z.infer<typeof calendarDateSchema>;
