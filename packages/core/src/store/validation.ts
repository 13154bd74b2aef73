import type { z } from 'zod';
import { formatIssues } from '@stockbook/types';
import { ValidationError } from './store-errors.js';

/**
 * Parse operation input, turning zod issues into a ValidationError
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }

  return result.data;
}

/**
 * Code-point order, so listings do not depend on the host locale
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Guard for computed quantities and money: every stored figure must be an
 * exactly representable integer.
 *
 * @throws {ValidationError} If `value` is outside ±(2^53 − 1)
 */
export function requireSafeInteger(value: number, label: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${label} exceeds the safe integer range`);
  }
  return value;
}
