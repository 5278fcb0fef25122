import { DEFAULT_DAYS_LOOKBACK } from '../constants';
import type { Granularity, TimeRange } from '../types';
import { InvalidInputError } from './errors';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Formats a date as YYYY-MM-DD in local time
 */
export function formatIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Checks that a string is a real calendar date in YYYY-MM-DD form and returns it unchanged
 */
export function validateDate(value: string): string {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    throw new InvalidInputError(`Invalid date format: ${value}. Expected YYYY-MM-DD`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(0);
  parsed.setUTCFullYear(year, month - 1, day);

  // out-of-range parts (month 13, Feb 30) roll over, so compare back
  if (
    year < 1 ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new InvalidInputError(`Invalid date format: ${value}. Expected YYYY-MM-DD`);
  }

  return value;
}

/**
 * Default window for cost queries: the last 30 days for DAILY, month-to-date for MONTHLY
 */
export function defaultRange(granularity: Granularity): TimeRange {
  if (granularity === 'DAILY') {
    return defaultLookback(30);
  }

  const today = new Date();
  const startOfMonth = new Date(today.getFullYear(), today.getMonth(), 1);
  return {
    start: formatIsoDate(startOfMonth),
    end: formatIsoDate(today)
  };
}

/**
 * Window ending today and starting `days` days earlier
 */
export function defaultLookback(days: number = DEFAULT_DAYS_LOOKBACK): TimeRange {
  const today = new Date();
  const start = new Date(today.getFullYear(), today.getMonth(), today.getDate() - days);
  return {
    start: formatIsoDate(start),
    end: formatIsoDate(today)
  };
}
