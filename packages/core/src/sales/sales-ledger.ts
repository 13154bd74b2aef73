/**
 * Sales Ledger
 *
 * Sales are tracked independently of inventory: recording a sale snapshots
 * the item's current price but never changes its stock.
 */

import type { SalesRecord } from '@stockbook/types';
import { SALES_ID_PREFIX } from '@stockbook/database';
import type { RecordStore } from '../store/record-store.js';
import { parseInput, requireSafeInteger } from '../store/validation.js';
import {
  requireActiveCustomer,
  requireActiveItem,
  resolveCustomerName,
  resolveItemName,
} from '../store/references.js';
import { Ledger, SALES_SECTION, type ListLedgerOptions } from '../ledger/ledger.js';
import {
  SaleInputSchema,
  type SaleInput,
  type SalesEntry,
  type SalesLine,
} from './sales-types.js';

export class SalesLedger extends Ledger<SalesRecord> {
  constructor(store: RecordStore) {
    super(store, SALES_SECTION, 'sales');
  }

  /**
   * Record one sale line
   *
   * @returns Id of the new sales record
   * @throws {ValidationError} If the quantity is invalid or the line total is out of range
   * @throws {NotFoundError} If the customer or item is unknown
   * @throws {DisabledEntityError} If the customer or item is disabled
   */
  addSale(input: SaleInput): string {
    const { cid, sku, qty, note } = parseInput(SaleInputSchema, input);
    requireActiveCustomer(this.store.data, cid);
    const item = requireActiveItem(this.store.data, sku);
    const lineTotal = requireSafeInteger(item.unit_price * qty, 'Line total');

    const record: SalesRecord = {
      id: this.store.newId(SALES_ID_PREFIX),
      ts: this.store.now(),
      cid,
      sku,
      qty,
      unit_price: item.unit_price,
      line_total: lineTotal,
      note,
      deleted: false,
    };

    this.append(record);
    this.store.commit();
    this.log.info({ id: record.id, cid, sku, qty, lineTotal: record.line_total }, 'Sale recorded');

    return record.id;
  }

  /**
   * Record several lines for one customer, one at a time.
   * There is no up-front check: a failing line throws and the lines before
   * it stay recorded.
   *
   * @returns Record ids in line order
   */
  addSalesBatch(cid: string, lines: SalesLine[]): string[] {
    return lines.map((line) => this.addSale({ ...line, cid }));
  }

  /**
   * Ledger rows with customer and item names resolved for display
   */
  listEntries(options: ListLedgerOptions = {}): SalesEntry[] {
    return this.list(options).map((record) => ({
      record,
      customerName: resolveCustomerName(this.store.data, record.cid),
      itemName: resolveItemName(this.store.data, record.sku),
    }));
  }
}
