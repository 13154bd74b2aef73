/**
 * Customer Registry Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  NotFoundError,
  ReferentialIntegrityError,
  ValidationError,
} from '../../store/store-errors.js';
import { openTestBook, type TestBook } from '../../test/helpers.js';

describe('CustomerRegistry', () => {
  let t: TestBook;

  beforeEach(() => {
    t = openTestBook();
  });

  afterEach(() => {
    t.workspace.cleanup();
  });

  it('should create and rename a customer', () => {
    expect(t.book.customers.upsert({ cid: ' C1 ', name: ' Acme ' })).toEqual({
      cid: 'C1',
      name: 'Acme',
      disabled: false,
      created_at: '2026-01-11 09:00:00',
      updated_at: '2026-01-11 09:00:00',
    });

    t.time.advance(30);
    expect(t.book.customers.upsert({ cid: 'C1', name: 'Acme Ltd' })).toEqual({
      cid: 'C1',
      name: 'Acme Ltd',
      disabled: false,
      created_at: '2026-01-11 09:00:00',
      updated_at: '2026-01-11 09:00:30',
    });
    expect(t.reopen().customers.get('C1').name).toBe('Acme Ltd');
  });

  it('should reject an empty id or name', () => {
    expect(() => t.book.customers.upsert({ cid: '', name: 'Acme' })).toThrow(
      'cid: Customer ID is required'
    );
    expect(() => t.book.customers.upsert({ cid: 'C1', name: '   ' })).toThrow(ValidationError);
    expect(t.book.customers.list({ includeDisabled: true })).toEqual([]);
  });

  it('should disable and enable', () => {
    t.book.customers.upsert({ cid: 'C1', name: 'Acme' });

    expect(t.book.customers.disable('C1').disabled).toBe(true);
    expect(t.book.customers.list()).toEqual([]);
    expect(t.book.customers.enable('C1').disabled).toBe(false);
    expect(() => t.book.customers.disable('C9')).toThrow('Customer not found: C9');
  });

  it('should list customers sorted by name', () => {
    t.book.customers.upsert({ cid: 'C3', name: 'Zenith' });
    t.book.customers.upsert({ cid: 'C1', name: 'Bravo' });
    t.book.customers.upsert({ cid: 'C2', name: 'Alpha' });
    t.book.customers.disable('C1');

    expect(t.book.customers.list().map((c) => c.cid)).toEqual(['C2', 'C3']);
    expect(t.book.customers.list({ includeDisabled: true }).map((c) => c.cid)).toEqual([
      'C2',
      'C1',
      'C3',
    ]);
  });

  describe('hardDelete', () => {
    beforeEach(() => {
      t.book.customers.upsert({ cid: 'C1', name: 'Acme' });
      t.book.items.upsert({ sku: 'SKU1', name: 'Widget', unitPrice: 10, category: 'Parts', stock: 0 });
    });

    it('should be blocked by active sales', () => {
      t.book.sales.addSale({ cid: 'C1', sku: 'SKU1', qty: 2 });

      expect(() => t.book.customers.hardDelete('C1')).toThrow(ReferentialIntegrityError);
      expect(() => t.book.customers.hardDelete('C1')).toThrow(
        'Customer C1 is referenced by 1 active ledger record(s); disable it instead'
      );
    });

    it('should not count soft-deleted sales', () => {
      const id = t.book.sales.addSale({ cid: 'C1', sku: 'SKU1', qty: 2 });
      t.book.sales.softDelete(id);

      t.book.customers.hardDelete('C1');

      expect(t.book.customers.find('C1')).toBeNull();
      expect(t.book.sales.listEntries({ includeDeleted: true })[0]?.customerName).toBe(
        '(deleted customer)'
      );
    });

    it('should orphan references when allowed', () => {
      t.book.sales.addSale({ cid: 'C1', sku: 'SKU1', qty: 2 });

      t.book.customers.hardDelete('C1', { allowOrphan: true });

      expect(t.book.customers.resolveName('C1')).toBe('(deleted customer)');
      expect(t.book.sales.list()[0]?.cid).toBe('C1');
    });

    it('should fail for an unknown customer', () => {
      expect(() => t.book.customers.hardDelete('C9')).toThrow(NotFoundError);
    });
  });
});
