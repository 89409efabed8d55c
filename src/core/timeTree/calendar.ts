import { InvariantViolationError } from '../../utils/errors.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

/**
 * UTC instant for a calendar date. Unlike `Date.UTC`, years 0-99 are taken literally.
 */
export function utcDate(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
}

export function monthName(month: number): string {
  const name = Number.isInteger(month) ? MONTH_NAMES[month - 1] : undefined;
  if (name === undefined) {
    throw new InvariantViolationError(`Month ${month} is outside 1-12`);
  }
  return name;
}

export function weekdayName(year: number, month: number, day: number): string {
  monthName(month);
  const date = utcDate(year, month, day);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new InvariantViolationError(`${year}-${month}-${day} is not a calendar date`);
  }
  const name = WEEKDAY_NAMES[date.getUTCDay()];
  if (name === undefined) {
    throw new InvariantViolationError(`No weekday for ${year}-${month}-${day}`);
  }
  return name;
}
