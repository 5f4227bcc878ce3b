import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

/**
 * Calendar day in `YYYY-MM-DD` form, as stored in the ledger and accepted in query strings
 */
export type DateString = `${number}-${number}-${number}`;

/**
 * Inclusive range of calendar days
 */
export type DateWindow = {
  start: Date;
  end: Date;
};

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): DateString {
  return dayjs.utc(date).format('YYYY-MM-DD') as DateString;
}

export function parseDate(date: string): Date {
  const d = dayjs.utc(date);
  if (!DATE_PATTERN.test(date) || !d.isValid() || d.format('YYYY-MM-DD') !== date) {
    throw new Error(`Invalid date '${date}'`);
  }
  return d.toDate();
}

export function startOfDay(date: Date): Date {
  return dayjs.utc(date).startOf('day').toDate();
}

export function startOfMonth(date: Date): Date {
  return dayjs.utc(date).startOf('month').toDate();
}

export function endOfMonth(date: Date): Date {
  return dayjs.utc(date).endOf('month').startOf('day').toDate();
}

export function startOfYear(date: Date): Date {
  return dayjs.utc(date).startOf('year').toDate();
}

export function addYears(date: Date, years: number): Date {
  return dayjs.utc(date).add(years, 'year').toDate();
}

export function addMonths(date: Date, months: number): Date {
  return dayjs.utc(date).add(months, 'month').toDate();
}

export function addDays(date: Date, days: number): Date {
  return dayjs.utc(date).add(days, 'day').toDate();
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: Date, to: Date): number {
  return dayjs.utc(to).startOf('day').diff(dayjs.utc(from).startOf('day'), 'day');
}

/**
 * Number of days covered by an inclusive range, never less than one
 */
export function daysInclusive(from: Date, to: Date): number {
  return Math.max(1, daysBetween(from, to) + 1);
}

/**
 * Whole calendar months from the month containing `from` to the month containing `to`
 */
export function monthsBetween(from: Date, to: Date): number {
  return dayjs.utc(startOfMonth(to)).diff(dayjs.utc(startOfMonth(from)), 'month');
}

/**
 * `YYYY-MM` key of the month containing the date
 */
export function monthKey(date: Date): string {
  return dayjs.utc(date).format('YYYY-MM');
}

/**
 * Short `MMM D` label such as `Mar 4`
 */
export function formatShortDate(date: Date): string {
  return dayjs.utc(date).format('MMM D');
}

export function isWithinWindow(date: Date, window: DateWindow): boolean {
  return isAfterOrSame(date, window.start) && isBeforeOrSame(date, window.end);
}

export function isBefore(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isBefore(dayjs.utc(date2), 'day');
}

export function isSame(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isSame(dayjs.utc(date2), 'day');
}

export function isBeforeOrSame(date1: Date, date2: Date): boolean {
  return isBefore(date1, date2) || isSame(date1, date2);
}

export function isAfter(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isAfter(dayjs.utc(date2), 'day');
}

export function isAfterOrSame(date1: Date, date2: Date): boolean {
  return isAfter(date1, date2) || isSame(date1, date2);
}

export function minDate(date1: Date, date2: Date): Date {
  return isBefore(date1, date2) ? date1 : date2;
}

export function maxDate(date1: Date, date2: Date): Date {
  return isAfter(date1, date2) ? date1 : date2;
}
