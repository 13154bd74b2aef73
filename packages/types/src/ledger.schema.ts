/**
 * Ledger record schemas for the inventory movement history and the sales ledger
 */

import { z } from 'zod';

export const INVENTORY_ACTIONS = ['IN', 'OUT', 'ADJUST'] as const;

export const InventoryActionSchema = z.enum(INVENTORY_ACTIONS);

export type InventoryAction = z.infer<typeof InventoryActionSchema>;

// Counts, prices and money stay within the range where integer arithmetic is exact
const Quantity = z.number().int().nonnegative().safe();
const Amount = z.number().int().safe();

/**
 * Soft-delete fields shared by both ledgers
 */
const AuditFields = {
  deleted: z.boolean(),
  deleted_at: z.string().optional(),
  deleted_reason: z.string().optional(),
};

export const InventoryMovementRecordSchema = z.object({
  id: z.string().min(1),
  ts: z.string(),
  action: InventoryActionSchema,
  sku: z.string(),
  qty: Quantity,
  unit_price: Quantity,
  amount: Amount,
  stock_after: Quantity,
  inventory_total_after: Amount,
  note: z.string(),
  ...AuditFields,
});

export type InventoryMovementRecord = z.infer<typeof InventoryMovementRecordSchema>;

export const SalesRecordSchema = z.object({
  id: z.string().min(1),
  ts: z.string(),
  cid: z.string(),
  sku: z.string(),
  qty: Quantity,
  unit_price: Quantity,
  line_total: Amount,
  note: z.string(),
  ...AuditFields,
});

export type SalesRecord = z.infer<typeof SalesRecordSchema>;

/**
 * Fields common to every ledger record, as seen by the soft-delete subsystem
 */
export type LedgerRecord = InventoryMovementRecord | SalesRecord;

// Older snapshots may lack ids and deleted flags; the normalizer fills them in.
export const StoredInventoryMovementSchema = InventoryMovementRecordSchema.extend({
  id: z.string().min(1).optional(),
  ts: z.string().default(''),
  unit_price: Quantity.default(0),
  amount: Amount.default(0),
  stock_after: Quantity.default(0),
  inventory_total_after: Amount.default(0),
  note: z.string().default(''),
  deleted: z.boolean().optional(),
});

export type StoredInventoryMovement = z.infer<typeof StoredInventoryMovementSchema>;

export const StoredSalesRecordSchema = SalesRecordSchema.extend({
  id: z.string().min(1).optional(),
  ts: z.string().default(''),
  unit_price: Quantity.default(0),
  line_total: Amount.default(0),
  note: z.string().default(''),
  deleted: z.boolean().optional(),
});

export type StoredSalesRecord = z.infer<typeof StoredSalesRecordSchema>;
