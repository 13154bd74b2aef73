/**
 * Inventory Domain Types
 */

import { z } from 'zod';
import { InventoryActionSchema, type InventoryMovementRecord } from '@stockbook/types';

const Action = z.string().trim().toUpperCase();

const Quantity = z
  .number()
  .int('Quantity must be a whole number')
  .nonnegative('Quantity cannot be negative')
  .safe('Quantity is too large');

/**
 * Single movement. For ADJUST, qty is the new absolute stock level.
 */
export const MovementInputSchema = z.object({
  action: Action.pipe(InventoryActionSchema),
  sku: z.string(),
  qty: Quantity,
  note: z.string().default(''),
});

export type MovementInput = z.input<typeof MovementInputSchema>;

export const BatchLineSchema = z.object({
  sku: z.string(),
  qty: Quantity,
  note: z.string().default(''),
});

export type BatchLine = z.input<typeof BatchLineSchema>;

// ADJUST has no batch form: several absolute targets at once are ambiguous.
export const BatchMovementSchema = z.object({
  action: Action.pipe(z.enum(['IN', 'OUT'])),
  lines: z.array(BatchLineSchema),
});

/**
 * Movement record joined with the current item master data for display
 */
export interface InventoryEntry {
  record: InventoryMovementRecord;
  itemName: string;
  category: string;
}
