/**
 * Item Domain Types
 */

import { z } from 'zod';
import type { ItemRecord } from '@stockbook/types';

export const UpsertItemSchema = z.object({
  sku: z.string().trim().min(1, 'SKU is required'),
  name: z.string().trim().min(1, 'Item name is required'),
  unitPrice: z
    .number()
    .int('Unit price must be a whole number')
    .nonnegative('Unit price cannot be negative')
    .safe('Unit price is too large'),
  category: z.string().trim().min(1, 'Category is required'),
  stock: z
    .number()
    .int('Stock must be a whole number')
    .nonnegative('Stock cannot be negative')
    .safe('Stock is too large'),
});

export type UpsertItemInput = z.input<typeof UpsertItemSchema>;

/**
 * Item as returned to callers: the stored record plus its SKU
 */
export interface Item extends ItemRecord {
  sku: string;
}

export interface ItemSummary {
  sku: string;
  name: string;
}

export interface ListItemsOptions {
  includeDisabled?: boolean;
}

export interface HardDeleteOptions {
  /** Delete even when active ledger records still reference the entity */
  allowOrphan?: boolean;
}
