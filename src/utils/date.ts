import moment from 'moment-timezone';
import { ValidationError } from './errors';

const CALENDAR_FORMAT = 'YYYY-MM-DD';
const LONG_FORMAT = 'MMMM DD, YYYY';

/**
 * Normalizes a calendar date (invoice date, due date) to UTC midnight.
 * Accepts a Date, a 'YYYY-MM-DD' string or a full ISO 8601 timestamp.
 *
 * @throws {ValidationError} If the value is not a valid date
 */
export function toCalendarDate(value: Date | string, field: string): Date {
  const parsed = typeof value === 'string'
    ? moment.utc(value, [CALENDAR_FORMAT, moment.ISO_8601], true)
    : moment.utc(value);

  if (!parsed.isValid()) {
    throw new ValidationError(`${field} must be a valid date`);
  }
  return parsed.startOf('day').toDate();
}

/**
 * Formats a calendar date as stored in DATE columns.
 *
 * @example
 * formatCalendarDate(new Date('2024-01-15')); // '2024-01-15'
 */
export function formatCalendarDate(date: Date): string {
  return moment.utc(date).format(CALENDAR_FORMAT);
}

/**
 * Long-form calendar date used on documents.
 *
 * @example
 * formatLongDate(new Date('2024-01-15')); // 'January 15, 2024'
 */
export function formatLongDate(date: Date): string {
  return moment.utc(date).format(LONG_FORMAT);
}

/**
 * The current calendar day in the given IANA time zone, as 'YYYY-MM-DD'.
 */
export function calendarDayIn(timezone: string, now: Date = new Date()): string {
  return moment.tz(now, timezone).format(CALENDAR_FORMAT);
}
