import { ValidationError } from '../store/store-errors.js';

/**
 * Inclusive timestamp bounds; either end may be open
 */
export interface TimestampRange {
  startTs?: string;
  endTs?: string;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function parseDay(value: string): string {
  const trimmed = value.trim();
  const match = DATE_PATTERN.exec(trimmed);
  if (!match) {
    throw new ValidationError(`Dates must use the YYYY-MM-DD format: ${value}`);
  }

  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    throw new ValidationError(`Not a calendar date: ${value}`);
  }

  return trimmed;
}

/**
 * Turn optional `YYYY-MM-DD` dates into whole-day timestamp bounds.
 * Blank strings leave that end open.
 *
 * @throws {ValidationError} If a date is malformed or does not exist
 */
export function dayRange(from?: string, to?: string): TimestampRange {
  const range: TimestampRange = {};
  if (from && from.trim()) {
    range.startTs = `${parseDay(from)} 00:00:00`;
  }
  if (to && to.trim()) {
    range.endTs = `${parseDay(to)} 23:59:59`;
  }
  return range;
}

export function withinRange(ts: string, range: TimestampRange): boolean {
  if (range.startTs && ts < range.startTs) return false;
  if (range.endTs && ts > range.endTs) return false;
  return true;
}
