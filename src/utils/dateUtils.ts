import { HmrcValidationError } from '../errors';
import { MAX_DATE_RANGE_DAYS } from '../constants';
import { DateInput } from '../types';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Format a date as HMRC expects it (`YYYY-MM-DD`)
 *
 * Date objects are formatted by their UTC calendar day. Strings must
 * already be ISO calendar dates and are checked for validity.
 *
 * @throws {HmrcValidationError} If the input is not a valid date
 */
export function formatDate(input: DateInput, field = 'date'): string {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new HmrcValidationError(`Invalid ${field}`, field);
    }
    return input.toISOString().slice(0, 10);
  }

  if (!isValidIsoDate(input)) {
    throw new HmrcValidationError(`Invalid ${field}: expected YYYY-MM-DD, got "${input}"`, field);
  }
  return input;
}

/**
 * Check that a string is an existing calendar date in `YYYY-MM-DD` form
 */
export function isValidIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Number of days from `from` to `to`, counting both ends
 */
export function inclusiveDays(from: string, to: string): number {
  return Math.round((Date.parse(to) - Date.parse(from)) / MS_PER_DAY) + 1;
}

/**
 * Format and check a date range for the VAT search endpoints
 *
 * @throws {HmrcValidationError} If a date is invalid, `to` precedes `from`,
 * or the range is longer than the API allows
 */
export function formatDateRange(from: DateInput, to: DateInput): { from: string; to: string } {
  const fromDate = formatDate(from, 'from');
  const toDate = formatDate(to, 'to');

  if (toDate < fromDate) {
    throw new HmrcValidationError(`Date range end ${toDate} is before start ${fromDate}`, 'to');
  }

  if (inclusiveDays(fromDate, toDate) > MAX_DATE_RANGE_DAYS) {
    throw new HmrcValidationError(`Date range must not exceed ${MAX_DATE_RANGE_DAYS} days`, 'to');
  }

  return { from: fromDate, to: toDate };
}
