import { randomUUID } from 'node:crypto';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const INVENTORY_ID_PREFIX = 'IH';
export const SALES_ID_PREFIX = 'S';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 * Ledger order relies on these strings sorting chronologically.
 */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * `YYYYMMDD_HHMMSS`, used in backup file names
 */
export function formatCompactTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function newRecordId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
