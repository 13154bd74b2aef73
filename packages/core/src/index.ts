/**
 * @stockbook/core - Record store for items, customers, stock and sales
 *
 * Master registries, the inventory and sales ledgers with their shared
 * soft-delete lifecycle, aggregations, and settings, all operating on one
 * owned RecordStore that persists after every mutation.
 */

export { Stockbook } from './stockbook.js';
export { RecordStore } from './store/record-store.js';
export type { RecordStoreOptions } from './store/record-store.js';
export {
  StoreError,
  ValidationError,
  NotFoundError,
  InsufficientStockError,
  DisabledEntityError,
  ReferentialIntegrityError,
} from './store/store-errors.js';
export type { EntityKind } from './store/store-errors.js';
export { DELETED_ITEM_LABEL, DELETED_CUSTOMER_LABEL } from './store/references.js';
export { SnapshotError, CorruptSnapshotError, MissingSnapshotError } from '@stockbook/database';
export { loadStockbookConfig } from './config.js';
export type { StockbookConfig } from './config.js';

export * from './items/index.js';
export * from './customers/index.js';
export * from './ledger/index.js';
export * from './inventory/index.js';
export * from './sales/index.js';
export * from './aggregation/index.js';
export * from './settings/index.js';
