/**
 * Sales Domain Types
 */

import { z } from 'zod';
import type { SalesRecord } from '@stockbook/types';

export const SaleInputSchema = z.object({
  cid: z.string(),
  sku: z.string(),
  qty: z
    .number()
    .int('Quantity must be a whole number')
    .nonnegative('Quantity cannot be negative')
    .safe('Quantity is too large'),
  note: z.string().default(''),
});

export type SaleInput = z.input<typeof SaleInputSchema>;

export type SalesLine = Omit<SaleInput, 'cid'>;

/**
 * Sales record joined with current customer and item names for display
 */
export interface SalesEntry {
  record: SalesRecord;
  customerName: string;
  itemName: string;
}
