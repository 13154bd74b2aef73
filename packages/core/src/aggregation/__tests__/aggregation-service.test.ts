/**
 * Aggregation Service Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { dayRange } from '../date-range.js';
import { openTestBook, type TestBook } from '../../test/helpers.js';

describe('AggregationService', () => {
  let t: TestBook;

  beforeEach(() => {
    t = openTestBook();
    t.book.items.upsert({ sku: 'SKU1', name: 'Widget', unitPrice: 100, category: 'Parts', stock: 3 });
    t.book.items.upsert({ sku: 'SKU2', name: 'Gadget', unitPrice: 50, category: 'Parts', stock: 2 });
    t.book.customers.upsert({ cid: 'C1', name: 'Acme' });
    t.book.customers.upsert({ cid: 'C2', name: 'Bolt Co' });
  });

  afterEach(() => {
    t.workspace.cleanup();
  });

  describe('inventoryValuation', () => {
    it('should sum stock times price over enabled items', () => {
      expect(t.book.aggregates.inventoryValuation()).toBe(400);

      t.book.items.disable('SKU1');

      expect(t.book.aggregates.inventoryValuation()).toBe(100);
    });

    it('should be zero for an empty store', () => {
      t.book.items.hardDelete('SKU1');
      t.book.items.hardDelete('SKU2');

      expect(t.book.aggregates.inventoryValuation()).toBe(0);
    });
  });

  describe('sales aggregates', () => {
    beforeEach(() => {
      t.time.set(new Date(2026, 0, 10, 12, 0, 0));
      t.book.sales.addSale({ cid: 'C1', sku: 'SKU1', qty: 1 });
      t.time.set(new Date(2026, 0, 11, 8, 30, 0));
      t.book.sales.addSale({ cid: 'C2', sku: 'SKU2', qty: 2 });
      t.time.set(new Date(2026, 0, 12, 23, 59, 59));
      t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 3 });
    });

    it('should sum every live sale without filters', () => {
      expect(t.book.aggregates.salesSum()).toBe(350);
    });

    it('should filter by inclusive timestamp bounds', () => {
      expect(t.book.aggregates.salesSum(dayRange('2026-01-11', '2026-01-12'))).toBe(250);
      expect(
        t.book.aggregates.salesSum({ startTs: '2026-01-10 12:00:00', endTs: '2026-01-11 08:30:00' })
      ).toBe(200);
    });

    it('should filter by customer', () => {
      expect(t.book.aggregates.salesSum({ cid: 'C1' })).toBe(250);
      expect(t.book.aggregates.salesSum({ cid: 'C1', ...dayRange('2026-01-10', '2026-01-10') })).toBe(
        100
      );
      expect(t.book.aggregates.salesSum({ cid: 'C9' })).toBe(0);
    });

    it('should treat an empty customer id as all customers', () => {
      expect(t.book.aggregates.salesSum({ cid: '' })).toBe(350);
      expect(t.book.aggregates.salesSum({ cid: '', ...dayRange('2026-01-11') })).toBe(250);
    });

    it('should total per customer, disabled ones included', () => {
      t.book.customers.upsert({ cid: 'C3', name: 'Aardvark' });
      t.book.customers.disable('C2');

      expect(t.book.aggregates.salesByCustomer()).toEqual([
        { cid: 'C3', name: 'Aardvark', total: 0 },
        { cid: 'C1', name: 'Acme', total: 250 },
        { cid: 'C2', name: 'Bolt Co', total: 100 },
      ]);
      expect(t.book.aggregates.salesByCustomer(dayRange('2026-01-12', '2026-01-12'))).toEqual([
        { cid: 'C3', name: 'Aardvark', total: 0 },
        { cid: 'C1', name: 'Acme', total: 150 },
        { cid: 'C2', name: 'Bolt Co', total: 0 },
      ]);
    });
  });

  describe('stockSeries', () => {
    it('should list stock_after of live movements in ledger order', () => {
      t.time.set(new Date(2026, 0, 10, 9, 0, 0));
      t.book.inventory.apply({ action: 'IN', sku: 'SKU1', qty: 2 });
      t.time.set(new Date(2026, 0, 11, 9, 0, 0));
      const mistake = t.book.inventory.apply({ action: 'OUT', sku: 'SKU1', qty: 4 });
      t.book.inventory.apply({ action: 'IN', sku: 'SKU2', qty: 1 });
      t.time.set(new Date(2026, 0, 12, 9, 0, 0));
      t.book.inventory.apply({ action: 'ADJUST', sku: 'SKU1', qty: 7 });
      t.book.inventory.softDelete(mistake);

      expect(t.book.aggregates.stockSeries('SKU1')).toEqual([
        { ts: '2026-01-10 09:00:00', stockAfter: 5 },
        { ts: '2026-01-12 09:00:00', stockAfter: 7 },
      ]);
      expect(t.book.aggregates.stockSeries('SKU1', dayRange('2026-01-11'))).toEqual([
        { ts: '2026-01-12 09:00:00', stockAfter: 7 },
      ]);
    });
  });
});
