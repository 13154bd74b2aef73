/**
 * Customer Registry
 *
 * Same lifecycle as items: upsert, enable/disable, and a hard delete that
 * sales references can block.
 */

import type { CustomerRecord } from '@stockbook/types';
import type { Logger } from '@stockbook/observability';
import type { RecordStore } from '../store/record-store.js';
import { NotFoundError, ReferentialIntegrityError } from '../store/store-errors.js';
import { compareText, parseInput } from '../store/validation.js';
import {
  countCustomerReferences,
  requireCustomer,
  resolveCustomerName,
} from '../store/references.js';
import type { HardDeleteOptions } from '../items/item-types.js';
import {
  UpsertCustomerSchema,
  type Customer,
  type ListCustomersOptions,
  type UpsertCustomerInput,
} from './customer-types.js';

function toCustomer(cid: string, record: CustomerRecord): Customer {
  return { cid, ...record };
}

export class CustomerRegistry {
  private readonly log: Logger;

  constructor(private readonly store: RecordStore) {
    this.log = store.moduleLogger('customers');
  }

  /**
   * Create a customer or rename an existing one
   *
   * @throws {ValidationError} If the ID or name is empty after trimming
   */
  upsert(input: UpsertCustomerInput): Customer {
    const { cid, name } = parseInput(UpsertCustomerSchema, input);
    const customers = this.store.data.customers;
    const ts = this.store.now();
    const existing = customers[cid];

    if (existing) {
      existing.name = name;
      existing.updated_at = ts;
    } else {
      customers[cid] = { name, disabled: false, created_at: ts, updated_at: ts };
    }

    this.store.commit();
    this.log.info({ cid, created: !existing }, existing ? 'Customer updated' : 'Customer created');

    return this.get(cid);
  }

  get(cid: string): Customer {
    return toCustomer(cid, requireCustomer(this.store.data, cid));
  }

  find(cid: string): Customer | null {
    const record = this.store.data.customers[cid];
    return record ? toCustomer(cid, record) : null;
  }

  disable(cid: string): Customer {
    return this.setDisabled(cid, true);
  }

  enable(cid: string): Customer {
    return this.setDisabled(cid, false);
  }

  /**
   * @throws {NotFoundError} If the customer is unknown
   * @throws {ReferentialIntegrityError} If active sales reference it and orphans are not allowed
   */
  hardDelete(cid: string, options: HardDeleteOptions = {}): void {
    requireCustomer(this.store.data, cid);

    const references = countCustomerReferences(this.store.data, cid);
    if (references > 0 && !options.allowOrphan) {
      this.log.warn({ cid, references }, 'Customer hard delete blocked by sales references');
      throw new ReferentialIntegrityError('customer', cid, references);
    }

    delete this.store.data.customers[cid];
    this.store.commit();
    this.log.info({ cid, orphanedReferences: references }, 'Customer hard deleted');
  }

  /**
   * Customers sorted by name, active only unless asked otherwise
   */
  list(options: ListCustomersOptions = {}): Customer[] {
    return Object.entries(this.store.data.customers)
      .filter(([, record]) => options.includeDisabled || !record.disabled)
      .map(([cid, record]) => toCustomer(cid, record))
      .sort((a, b) => compareText(a.name, b.name) || compareText(a.cid, b.cid));
  }

  resolveName(cid: string): string {
    return resolveCustomerName(this.store.data, cid);
  }

  private setDisabled(cid: string, disabled: boolean): Customer {
    const record = this.store.data.customers[cid];
    if (!record) {
      throw new NotFoundError('customer', cid);
    }

    record.disabled = disabled;
    record.updated_at = this.store.now();
    this.store.commit();
    this.log.info({ cid, disabled }, disabled ? 'Customer disabled' : 'Customer enabled');

    return toCustomer(cid, record);
  }
}
