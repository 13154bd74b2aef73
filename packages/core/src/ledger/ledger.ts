/**
 * Ledger base
 *
 * Soft-delete lifecycle shared by the inventory and sales ledgers. Records
 * are immutable facts once written; only the deleted / deleted_at /
 * deleted_reason fields ever change, until a hard delete or purge removes
 * them outright.
 */

import type {
  Dataset,
  InventoryMovementRecord,
  LedgerRecord,
  SalesRecord,
} from '@stockbook/types';
import type { Logger } from '@stockbook/observability';
import type { RecordStore } from '../store/record-store.js';
import { NotFoundError } from '../store/store-errors.js';
import { compareText } from '../store/validation.js';

/**
 * Where a ledger lives inside the dataset
 */
export interface LedgerSection<T extends LedgerRecord> {
  entity: 'inventory record' | 'sales record';
  read(data: Dataset): T[];
  write(data: Dataset, records: T[]): void;
}

export const INVENTORY_SECTION: LedgerSection<InventoryMovementRecord> = {
  entity: 'inventory record',
  read: (data) => data.inventory_history,
  write: (data, records) => {
    data.inventory_history = records;
  },
};

export const SALES_SECTION: LedgerSection<SalesRecord> = {
  entity: 'sales record',
  read: (data) => data.sales,
  write: (data, records) => {
    data.sales = records;
  },
};

export interface ListLedgerOptions {
  includeDeleted?: boolean;
}

/**
 * Ascending by timestamp; Array.prototype.sort is stable, so records written
 * in the same second keep their insertion order.
 */
export function sortByTimestamp<T extends LedgerRecord>(records: T[]): T[] {
  return [...records].sort((a, b) => compareText(a.ts, b.ts));
}

export abstract class Ledger<T extends LedgerRecord> {
  protected readonly log: Logger;

  protected constructor(
    protected readonly store: RecordStore,
    private readonly section: LedgerSection<T>,
    module: string
  ) {
    this.log = store.moduleLogger(module);
  }

  /**
   * Records in ledger order, hiding soft-deleted ones by default
   */
  list(options: ListLedgerOptions = {}): T[] {
    const visible = this.records.filter((record) => options.includeDeleted || !record.deleted);
    return sortByTimestamp(visible).map((record) => ({ ...record }));
  }

  /**
   * @throws {NotFoundError} If no record has this id, deleted or not
   */
  get(id: string): T {
    return { ...this.locate(id) };
  }

  /**
   * Hide a record, keeping it restorable
   *
   * @throws {NotFoundError} If no record has this id
   */
  softDelete(id: string, reason = ''): T {
    const record = this.locate(id);

    record.deleted = true;
    record.deleted_at = this.store.now();
    record.deleted_reason = reason;

    this.store.commit();
    this.log.info({ id, reason }, `${this.label} soft deleted`);

    return { ...record };
  }

  /**
   * Undo a soft delete and drop its metadata
   *
   * @throws {NotFoundError} If no record has this id
   */
  restore(id: string): T {
    const record = this.locate(id);

    record.deleted = false;
    delete record.deleted_at;
    delete record.deleted_reason;

    this.store.commit();
    this.log.info({ id }, `${this.label} restored`);

    return { ...record };
  }

  /**
   * Remove one record whatever its deleted flag.
   * stock_after and inventory_total_after on other records are left as written.
   *
   * @throws {NotFoundError} If no record has this id
   */
  hardDelete(id: string): void {
    this.locate(id);

    this.section.write(
      this.store.data,
      this.records.filter((record) => record.id !== id)
    );

    this.store.commit();
    this.log.info({ id }, `${this.label} hard deleted`);
  }

  /**
   * Permanently remove every soft-deleted record
   *
   * @returns Number of records removed
   */
  purgeDeleted(): number {
    const remaining = this.records.filter((record) => !record.deleted);
    const removed = this.records.length - remaining.length;

    if (removed === 0) {
      return 0;
    }

    this.section.write(this.store.data, remaining);
    this.store.commit();
    this.log.info({ removed }, `Purged deleted ${this.section.entity}s`);

    return removed;
  }

  protected get records(): T[] {
    return this.section.read(this.store.data);
  }

  protected append(record: T): void {
    this.records.push(record);
  }

  private get label(): string {
    const entity = this.section.entity;
    return entity.charAt(0).toUpperCase() + entity.slice(1);
  }

  private locate(id: string): T {
    const record = this.records.find((candidate) => candidate.id === id);
    if (!record) {
      throw new NotFoundError(this.section.entity, id);
    }
    return record;
  }
}
