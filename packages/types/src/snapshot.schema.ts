/**
 * Snapshot document schemas
 *
 * The snapshot is one JSON document with six top-level sections. Field names
 * and nesting are the compatibility surface with existing data files.
 */

import { z } from 'zod';
import {
  CustomerRecordSchema,
  ItemRecordSchema,
  StoredCustomerSchema,
  StoredItemSchema,
} from './master.schema.js';
import {
  InventoryMovementRecordSchema,
  SalesRecordSchema,
  StoredInventoryMovementSchema,
  StoredSalesRecordSchema,
} from './ledger.schema.js';
import { SettingsSchema, StoredSettingsSchema } from './settings.schema.js';

export const CategoryColorsSchema = z.record(z.string(), z.string());

export type CategoryColors = z.infer<typeof CategoryColorsSchema>;

/**
 * Fully populated dataset, the shape every store operation works against
 */
export const DatasetSchema = z.object({
  items: z.record(z.string(), ItemRecordSchema),
  customers: z.record(z.string(), CustomerRecordSchema),
  inventory_history: z.array(InventoryMovementRecordSchema),
  sales: z.array(SalesRecordSchema),
  category_colors: CategoryColorsSchema,
  settings: SettingsSchema,
});

export type Dataset = z.infer<typeof DatasetSchema>;

/**
 * Snapshot as read from disk, before normalization.
 * Missing sections default to empty; present sections must have the right shape.
 */
export const StoredSnapshotSchema = z.object({
  items: z.record(z.string(), StoredItemSchema).default({}),
  customers: z.record(z.string(), StoredCustomerSchema).default({}),
  inventory_history: z.array(StoredInventoryMovementSchema).default([]),
  sales: z.array(StoredSalesRecordSchema).default([]),
  category_colors: CategoryColorsSchema.default({}),
  settings: StoredSettingsSchema,
});

export type StoredSnapshot = z.infer<typeof StoredSnapshotSchema>;
