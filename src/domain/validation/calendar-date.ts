import { matches } from 'class-validator';
import { DataValidationError } from '@/domain/errors';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function isRealDay(year: number, month: number, day: number): boolean {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  const lastDay = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day <= lastDay;
}

/**
 * Parses an ISO-8601 calendar date (`YYYY-MM-DD`, years 0001-9999) naming a real day.
 * The value is kept as text: dates carry no time or timezone and compare lexically.
 *
 * @throws {DataValidationError} When the value is not such a date
 */
export function parseCalendarDate(value: unknown, field = 'last_relevance_date'): string {
  if (typeof value === 'string' && matches(value, CALENDAR_DATE_PATTERN)) {
    const [year, month, day] = value.split('-').map(Number);
    if (isRealDay(year, month, day)) {
      return value;
    }
  }

  throw new DataValidationError(
    `Invalid date for [${field}]: '${String(value)}' is not an ISO-8601 calendar date (YYYY-MM-DD)`,
    'bad_date',
    field,
  );
}
