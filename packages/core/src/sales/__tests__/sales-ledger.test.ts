/**
 * Sales Ledger Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DisabledEntityError, NotFoundError } from '../../store/store-errors.js';
import { openTestBook, type TestBook } from '../../test/helpers.js';

describe('SalesLedger', () => {
  let t: TestBook;

  beforeEach(() => {
    t = openTestBook();
    t.book.customers.upsert({ cid: 'C1', name: 'Acme' });
    t.book.items.upsert({ sku: 'SKU2', name: 'Gadget', unitPrice: 50, category: 'Parts', stock: 1 });
  });

  afterEach(() => {
    t.workspace.cleanup();
  });

  describe('addSale', () => {
    it('should record the line at the current price without touching stock', () => {
      t.time.advance(60);

      const id = t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 4 });

      expect(id).toBe('S_0001');
      expect(t.book.sales.get(id)).toEqual({
        id: 'S_0001',
        ts: '2026-01-11 09:01:00',
        cid: 'C1',
        sku: 'SKU2',
        qty: 4,
        unit_price: 50,
        line_total: 200,
        note: '',
        deleted: false,
      });
      expect(t.book.items.get('SKU2').stock).toBe(1);
      expect(t.book.aggregates.salesSum({ cid: 'C1' })).toBe(200);
    });

    it('should drop out of the sum once soft deleted', () => {
      const id = t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 4 });

      t.book.sales.softDelete(id, 'returned');

      expect(t.book.aggregates.salesSum({ cid: 'C1' })).toBe(0);
      expect(t.book.sales.list()).toEqual([]);
      expect(t.book.sales.list({ includeDeleted: true })).toHaveLength(1);
    });

    it('should keep the price it was sold at', () => {
      const id = t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 2 });
      t.book.items.upsert({ sku: 'SKU2', name: 'Gadget', unitPrice: 80, category: 'Parts', stock: 1 });

      expect(t.book.sales.get(id).line_total).toBe(100);
    });

    it('should reject unknown or disabled customers and items', () => {
      expect(() => t.book.sales.addSale({ cid: 'C9', sku: 'SKU2', qty: 1 })).toThrow(
        'Customer not found: C9'
      );
      expect(() => t.book.sales.addSale({ cid: 'C1', sku: 'NOPE', qty: 1 })).toThrow(NotFoundError);

      t.book.customers.disable('C1');
      expect(() => t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 1 })).toThrow(
        DisabledEntityError
      );

      t.book.customers.enable('C1');
      t.book.items.disable('SKU2');
      expect(() => t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 1 })).toThrow(
        'Item is disabled: SKU2'
      );
      expect(t.book.sales.list({ includeDeleted: true })).toEqual([]);
    });

    it('should reject a line total beyond the safe integer range', () => {
      t.book.items.upsert({
        sku: 'SKU9',
        name: 'Bulk',
        unitPrice: 3002399751580331,
        category: 'Parts',
        stock: 0,
      });

      expect(() => t.book.sales.addSale({ cid: 'C1', sku: 'SKU9', qty: 3 })).toThrow(
        'Line total exceeds the safe integer range'
      );
      expect(t.book.sales.list()).toEqual([]);
      expect(t.reopen().sales.list()).toEqual([]);
    });

    it('should reject a fractional quantity', () => {
      expect(() => t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 1.5 })).toThrow(
        'qty: Quantity must be a whole number'
      );
    });
  });

  describe('addSalesBatch', () => {
    beforeEach(() => {
      t.book.items.upsert({ sku: 'SKU3', name: 'Gizmo', unitPrice: 5, category: 'Parts', stock: 0 });
    });

    it('should record every line for the customer', () => {
      const ids = t.book.sales.addSalesBatch('C1', [
        { sku: 'SKU2', qty: 1 },
        { sku: 'SKU3', qty: 3, note: 'bundle' },
      ]);

      expect(ids).toEqual(['S_0001', 'S_0002']);
      expect(t.book.aggregates.salesSum({ cid: 'C1' })).toBe(65);
    });

    it('should keep the lines before a failing one', () => {
      expect(() =>
        t.book.sales.addSalesBatch('C1', [
          { sku: 'SKU2', qty: 1 },
          { sku: 'NOPE', qty: 1 },
          { sku: 'SKU3', qty: 1 },
        ])
      ).toThrow(NotFoundError);

      expect(t.book.sales.list().map((r) => r.sku)).toEqual(['SKU2']);
      expect(t.reopen().sales.list()).toHaveLength(1);
    });
  });

  describe('listEntries', () => {
    it('should resolve names and fall back to placeholders', () => {
      t.book.sales.addSale({ cid: 'C1', sku: 'SKU2', qty: 1 });
      t.book.items.hardDelete('SKU2', { allowOrphan: true });
      t.book.customers.hardDelete('C1', { allowOrphan: true });

      const [entry] = t.book.sales.listEntries();
      expect(entry?.customerName).toBe('(deleted customer)');
      expect(entry?.itemName).toBe('(deleted item)');
      expect(entry?.record.line_total).toBe(50);
    });
  });
});
