/**
 * Schema Normalizer
 *
 * Turns a parsed (possibly older) snapshot into a fully populated dataset.
 * Runs once at load time so the rest of the store never checks for
 * optional fields.
 */

import {
  DEFAULT_SETTINGS,
  type CustomerRecord,
  type Dataset,
  type InventoryMovementRecord,
  type ItemRecord,
  type SalesRecord,
  type StoredSnapshot,
} from '@stockbook/types';
import { INVENTORY_ID_PREFIX, SALES_ID_PREFIX, newRecordId } from './timestamps.js';

export interface NormalizeOptions {
  /** Timestamp written into missing created_at / updated_at fields */
  now: string;
  newId?: (prefix: string) => string;
}

export function createDefaultDataset(): Dataset {
  return {
    items: {},
    customers: {},
    inventory_history: [],
    sales: [],
    category_colors: {},
    settings: { ...DEFAULT_SETTINGS },
  };
}

export function normalizeSnapshot(stored: StoredSnapshot, options: NormalizeOptions): Dataset {
  const { now } = options;
  const newId = options.newId ?? newRecordId;

  const items: Record<string, ItemRecord> = {};
  for (const [sku, item] of Object.entries(stored.items)) {
    items[sku] = {
      ...item,
      created_at: item.created_at || now,
      updated_at: item.updated_at || now,
    };
  }

  const customers: Record<string, CustomerRecord> = {};
  for (const [cid, customer] of Object.entries(stored.customers)) {
    customers[cid] = {
      ...customer,
      created_at: customer.created_at || now,
      updated_at: customer.updated_at || now,
    };
  }

  const inventoryHistory: InventoryMovementRecord[] = stored.inventory_history.map((record) => ({
    ...record,
    id: record.id ?? newId(INVENTORY_ID_PREFIX),
    deleted: record.deleted ?? false,
  }));

  const sales: SalesRecord[] = stored.sales.map((record) => ({
    ...record,
    id: record.id ?? newId(SALES_ID_PREFIX),
    deleted: record.deleted ?? false,
  }));

  return {
    items,
    customers,
    inventory_history: inventoryHistory,
    sales,
    category_colors: { ...stored.category_colors },
    settings: { ...stored.settings },
  };
}
