/**
 * Item Registry
 *
 * Item master data: upsert, enable/disable lifecycle, hard delete guarded by
 * ledger references, and sorted listings for the presentation layer.
 */

import type { ItemRecord } from '@stockbook/types';
import type { Logger } from '@stockbook/observability';
import type { RecordStore } from '../store/record-store.js';
import { NotFoundError, ReferentialIntegrityError } from '../store/store-errors.js';
import { compareText, parseInput } from '../store/validation.js';
import { computeInventoryValuation } from '../aggregation/valuation.js';
import { countItemReferences, requireItem, resolveItemName } from '../store/references.js';
import {
  UpsertItemSchema,
  type HardDeleteOptions,
  type Item,
  type ItemSummary,
  type ListItemsOptions,
  type UpsertItemInput,
} from './item-types.js';

function toItem(sku: string, record: ItemRecord): Item {
  return { sku, ...record };
}

function byName(a: ItemSummary, b: ItemSummary): number {
  return compareText(a.name, b.name) || compareText(a.sku, b.sku);
}

export class ItemRegistry {
  private readonly log: Logger;

  constructor(private readonly store: RecordStore) {
    this.log = store.moduleLogger('items');
  }

  /**
   * Create an item or update an existing one in place
   *
   * Business rules:
   * - SKU, name and category must be non-empty after trimming
   * - Unit price and stock must be non-negative integers
   * - Updates keep created_at and the disabled flag
   * - The item's value and the resulting inventory valuation must be safe integers
   *
   * @throws {ValidationError} If any field is invalid
   */
  upsert(input: UpsertItemInput): Item {
    const { sku, name, unitPrice, category, stock } = parseInput(UpsertItemSchema, input);
    const items = this.store.data.items;
    const ts = this.store.now();
    const existing = items[sku];

    computeInventoryValuation(items, {
      [sku]: { stock, unit_price: unitPrice, disabled: existing?.disabled ?? false },
    });

    if (existing) {
      existing.name = name;
      existing.unit_price = unitPrice;
      existing.category = category;
      existing.stock = stock;
      existing.updated_at = ts;
    } else {
      items[sku] = {
        name,
        unit_price: unitPrice,
        category,
        stock,
        disabled: false,
        created_at: ts,
        updated_at: ts,
      };
    }

    this.store.commit();
    this.log.info({ sku, created: !existing }, existing ? 'Item updated' : 'Item created');

    return this.get(sku);
  }

  /**
   * @throws {NotFoundError} If the SKU is unknown
   */
  get(sku: string): Item {
    return toItem(sku, requireItem(this.store.data, sku));
  }

  find(sku: string): Item | null {
    const record = this.store.data.items[sku];
    return record ? toItem(sku, record) : null;
  }

  disable(sku: string): Item {
    return this.setDisabled(sku, true);
  }

  /**
   * @throws {NotFoundError} If the SKU is unknown
   * @throws {ValidationError} If counting the item again takes the valuation out of range
   */
  enable(sku: string): Item {
    return this.setDisabled(sku, false);
  }

  /**
   * Physically remove an item. Unlike ledger records there is no soft stage.
   *
   * @throws {NotFoundError} If the SKU is unknown
   * @throws {ReferentialIntegrityError} If active ledger records reference it and orphans are not allowed
   */
  hardDelete(sku: string, options: HardDeleteOptions = {}): void {
    requireItem(this.store.data, sku);

    const references = countItemReferences(this.store.data, sku);
    if (references > 0 && !options.allowOrphan) {
      this.log.warn({ sku, references }, 'Item hard delete blocked by ledger references');
      throw new ReferentialIntegrityError('item', sku, references);
    }

    delete this.store.data.items[sku];
    this.store.commit();
    this.log.info({ sku, orphanedReferences: references }, 'Item hard deleted');
  }

  list(options: ListItemsOptions = {}): Item[] {
    return Object.entries(this.store.data.items)
      .filter(([, record]) => options.includeDisabled || !record.disabled)
      .map(([sku, record]) => toItem(sku, record))
      .sort(byName);
  }

  /**
   * Distinct non-empty categories, active items only unless asked otherwise
   */
  listCategories(options: ListItemsOptions = {}): string[] {
    const categories = new Set<string>();
    for (const record of Object.values(this.store.data.items)) {
      if (!options.includeDisabled && record.disabled) continue;
      if (record.category) categories.add(record.category);
    }
    return [...categories].sort(compareText);
  }

  listByCategory(category: string, options: ListItemsOptions = {}): ItemSummary[] {
    return Object.entries(this.store.data.items)
      .filter(([, record]) => record.category === category)
      .filter(([, record]) => options.includeDisabled || !record.disabled)
      .map(([sku, record]) => ({ sku, name: record.name }))
      .sort(byName);
  }

  /**
   * Display name for a SKU, or a placeholder once the item is gone
   */
  resolveName(sku: string): string {
    return resolveItemName(this.store.data, sku);
  }

  private setDisabled(sku: string, disabled: boolean): Item {
    const record = this.store.data.items[sku];
    if (!record) {
      throw new NotFoundError('item', sku);
    }
    if (!disabled) {
      computeInventoryValuation(this.store.data.items, { [sku]: { ...record, disabled } });
    }

    record.disabled = disabled;
    record.updated_at = this.store.now();
    this.store.commit();
    this.log.info({ sku, disabled }, disabled ? 'Item disabled' : 'Item enabled');

    return toItem(sku, record);
  }
}
