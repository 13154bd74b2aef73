/**
 * Stockbook
 *
 * Facade wiring every service to one RecordStore. The presentation layer
 * constructs it once at startup and keeps it for the life of the process.
 */

import { RecordStore, type RecordStoreOptions } from './store/record-store.js';
import { ItemRegistry } from './items/item-registry.js';
import { CustomerRegistry } from './customers/customer-registry.js';
import { InventoryLedger } from './inventory/inventory-ledger.js';
import { SalesLedger } from './sales/sales-ledger.js';
import { AggregationService } from './aggregation/aggregation-service.js';
import { SettingsService } from './settings/settings-service.js';

export class Stockbook {
  readonly items: ItemRegistry;
  readonly customers: CustomerRegistry;
  readonly inventory: InventoryLedger;
  readonly sales: SalesLedger;
  readonly aggregates: AggregationService;
  readonly settings: SettingsService;

  constructor(readonly store: RecordStore) {
    this.items = new ItemRegistry(store);
    this.customers = new CustomerRegistry(store);
    this.inventory = new InventoryLedger(store);
    this.sales = new SalesLedger(store);
    this.aggregates = new AggregationService(store);
    this.settings = new SettingsService(store);
  }

  /**
   * @throws {CorruptSnapshotError} If the existing snapshot cannot be read
   */
  static open(path: string, options: RecordStoreOptions = {}): Stockbook {
    return new Stockbook(RecordStore.open(path, options));
  }

  /**
   * Copy the current snapshot file; purely additive
   *
   * @throws {MissingSnapshotError} If the snapshot file has disappeared
   */
  backup(backupDir?: string): string {
    return this.store.backup(backupDir);
  }
}
