/**
 * Aggregation Service
 *
 * Summary figures computed on demand from the live dataset. Nothing here is
 * cached, so results always agree with the current master data and ledgers.
 */

import type { RecordStore } from '../store/record-store.js';
import { compareText } from '../store/validation.js';
import { sortByTimestamp } from '../ledger/ledger.js';
import { computeInventoryValuation } from './valuation.js';
import { withinRange, type TimestampRange } from './date-range.js';

export interface SalesSumFilter extends TimestampRange {
  /** Restrict to one customer; omit or leave empty for all customers */
  cid?: string;
}

export interface CustomerSalesTotal {
  cid: string;
  name: string;
  total: number;
}

export interface StockPoint {
  ts: string;
  stockAfter: number;
}

export class AggregationService {
  constructor(private readonly store: RecordStore) {}

  inventoryValuation(): number {
    return computeInventoryValuation(this.store.data.items);
  }

  /**
   * Sum of line_total over non-deleted sales with startTs ≤ ts ≤ endTs
   */
  salesSum(filter: SalesSumFilter = {}): number {
    let total = 0;
    for (const record of this.store.data.sales) {
      if (record.deleted) continue;
      if (!withinRange(record.ts, filter)) continue;
      if (filter.cid && record.cid !== filter.cid) continue;
      total += record.line_total;
    }
    return total;
  }

  /**
   * Per-customer sales totals for every customer, disabled ones included, sorted by name
   */
  salesByCustomer(range: TimestampRange = {}): CustomerSalesTotal[] {
    return Object.entries(this.store.data.customers)
      .map(([cid, customer]) => ({
        cid,
        name: customer.name,
        total: this.salesSum({ ...range, cid }),
      }))
      .sort((a, b) => compareText(a.name, b.name) || compareText(a.cid, b.cid));
  }

  /**
   * Stock level after each non-deleted movement of one SKU, in ledger order
   */
  stockSeries(sku: string, range: TimestampRange = {}): StockPoint[] {
    const records = this.store.data.inventory_history.filter(
      (record) => record.sku === sku && !record.deleted && withinRange(record.ts, range)
    );
    return sortByTimestamp(records).map((record) => ({
      ts: record.ts,
      stockAfter: record.stock_after,
    }));
  }
}
