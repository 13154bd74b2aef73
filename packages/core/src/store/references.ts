/**
 * Lookups across master data and ledgers
 *
 * Ledger records point at items and customers by identifier only, and the
 * target may have been hard-deleted since.
 */

import type { CustomerRecord, Dataset, ItemRecord } from '@stockbook/types';
import { DisabledEntityError, NotFoundError } from './store-errors.js';

export const DELETED_ITEM_LABEL = '(deleted item)';
export const DELETED_CUSTOMER_LABEL = '(deleted customer)';

export function resolveItemName(data: Dataset, sku: string): string {
  return data.items[sku]?.name ?? DELETED_ITEM_LABEL;
}

export function resolveCustomerName(data: Dataset, cid: string): string {
  return data.customers[cid]?.name ?? DELETED_CUSTOMER_LABEL;
}

export function requireItem(data: Dataset, sku: string): ItemRecord {
  const item = data.items[sku];
  if (!item) {
    throw new NotFoundError('item', sku);
  }
  return item;
}

export function requireActiveItem(data: Dataset, sku: string): ItemRecord {
  const item = requireItem(data, sku);
  if (item.disabled) {
    throw new DisabledEntityError('item', sku);
  }
  return item;
}

export function requireCustomer(data: Dataset, cid: string): CustomerRecord {
  const customer = data.customers[cid];
  if (!customer) {
    throw new NotFoundError('customer', cid);
  }
  return customer;
}

export function requireActiveCustomer(data: Dataset, cid: string): CustomerRecord {
  const customer = requireCustomer(data, cid);
  if (customer.disabled) {
    throw new DisabledEntityError('customer', cid);
  }
  return customer;
}

/**
 * Number of non-deleted ledger records that reference an item
 */
export function countItemReferences(data: Dataset, sku: string): number {
  const inInventory = data.inventory_history.filter((r) => r.sku === sku && !r.deleted).length;
  const inSales = data.sales.filter((r) => r.sku === sku && !r.deleted).length;
  return inInventory + inSales;
}

/**
 * Number of non-deleted sales records that reference a customer
 */
export function countCustomerReferences(data: Dataset, cid: string): number {
  return data.sales.filter((r) => r.cid === cid && !r.deleted).length;
}
