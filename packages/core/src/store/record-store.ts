/**
 * Record Store
 *
 * The one owned handle on the in-memory dataset and its snapshot file.
 * Services receive the store by reference and call `commit()` after every
 * mutation, so each successful operation is on disk before it returns.
 */

import {
  backupSnapshot,
  formatTimestamp,
  loadSnapshot,
  newRecordId,
  saveSnapshot,
  systemClock,
  type Clock,
} from '@stockbook/database';
import { logger as defaultLogger, type Logger } from '@stockbook/observability';
import type { Dataset } from '@stockbook/types';
import { StoreError } from './store-errors.js';

export interface RecordStoreOptions {
  clock?: Clock;
  logger?: Logger;
  /** Record id factory, receives the ledger prefix ("IH" or "S") */
  newId?: (prefix: string) => string;
  /**
   * Load without writing the normalized snapshot back. The file must exist,
   * and commit() throws, so a read-only store is for queries only.
   */
  readOnly?: boolean;
}

export class RecordStore {
  readonly logger: Logger;
  private readonly rootLogger: Logger;
  private readonly clock: Clock;
  private readonly idFactory: (prefix: string) => string;
  private readonly readOnly: boolean;

  private constructor(
    readonly path: string,
    readonly data: Dataset,
    options: RecordStoreOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.idFactory = options.newId ?? newRecordId;
    this.readOnly = options.readOnly ?? false;
    this.rootLogger = options.logger ?? defaultLogger;
    this.logger = this.rootLogger.child({ module: 'store' });
  }

  /**
   * Load (or create) the snapshot at `path`, normalize it and write the
   * normalized form back so later reloads see the same dataset.
   * With `readOnly` the file is never written.
   *
   * @throws {CorruptSnapshotError} If the existing file cannot be read as a snapshot
   * @throws {MissingSnapshotError} If `readOnly` is set and there is no file
   */
  static open(path: string, options: RecordStoreOptions = {}): RecordStore {
    const data = loadSnapshot(path, {
      ...(options.clock && { clock: options.clock }),
      ...(options.newId && { newId: options.newId }),
      mustExist: options.readOnly ?? false,
    });
    const store = new RecordStore(path, data, options);
    if (!store.readOnly) {
      store.commit();
    }

    store.logger.info(
      {
        path,
        items: Object.keys(data.items).length,
        customers: Object.keys(data.customers).length,
        inventoryRecords: data.inventory_history.length,
        salesRecords: data.sales.length,
        readOnly: store.readOnly,
      },
      'Record store opened'
    );

    return store;
  }

  /**
   * Child logger for one service module
   */
  moduleLogger(module: string): Logger {
    return this.rootLogger.child({ module });
  }

  now(): string {
    return formatTimestamp(this.clock());
  }

  newId(prefix: string): string {
    return this.idFactory(prefix);
  }

  /**
   * Persist the current dataset with an atomic replace
   *
   * @throws {StoreError} If the store was opened read-only
   */
  commit(): void {
    if (this.readOnly) {
      throw new StoreError(`Record store is read-only: ${this.path}`);
    }
    saveSnapshot(this.path, this.data);
  }

  /**
   * Copy the snapshot file next to itself (or into `backupDir`)
   *
   * @returns Path of the backup file
   */
  backup(backupDir?: string): string {
    const target = backupSnapshot(this.path, {
      clock: this.clock,
      ...(backupDir && { backupDir }),
    });
    this.logger.info({ source: this.path, target }, 'Snapshot backup created');
    return target;
  }
}
