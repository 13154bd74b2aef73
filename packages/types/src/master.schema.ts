/**
 * Master data schemas (items and customers)
 *
 * Records are keyed by their identity in the snapshot (`items[sku]`,
 * `customers[cid]`), so the identity is not repeated inside the record.
 */

import { z } from 'zod';

const Quantity = z.number().int().nonnegative().safe();

export const ItemRecordSchema = z.object({
  name: z.string(),
  unit_price: Quantity,
  category: z.string(),
  stock: Quantity,
  disabled: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type ItemRecord = z.infer<typeof ItemRecordSchema>;

export const CustomerRecordSchema = z.object({
  name: z.string(),
  disabled: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type CustomerRecord = z.infer<typeof CustomerRecordSchema>;

/**
 * As found on disk: older snapshots may lack any of the defaulted fields.
 * Timestamps stay optional here and are backfilled by the normalizer.
 */
export const StoredItemSchema = ItemRecordSchema.extend({
  name: z.string().default(''),
  unit_price: Quantity.default(0),
  category: z.string().default(''),
  stock: Quantity.default(0),
  disabled: z.boolean().default(false),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type StoredItem = z.infer<typeof StoredItemSchema>;

export const StoredCustomerSchema = CustomerRecordSchema.extend({
  name: z.string().default(''),
  disabled: z.boolean().default(false),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type StoredCustomer = z.infer<typeof StoredCustomerSchema>;
