/**
 * Inventory Ledger
 *
 * Stock movements (IN / OUT / ADJUST). Each movement updates the item's stock
 * and appends a record carrying point-in-time stock_after and
 * inventory_total_after values that are never recomputed later.
 */

import type { InventoryAction, InventoryMovementRecord, ItemRecord } from '@stockbook/types';
import { INVENTORY_ID_PREFIX } from '@stockbook/database';
import type { RecordStore } from '../store/record-store.js';
import { InsufficientStockError } from '../store/store-errors.js';
import { parseInput } from '../store/validation.js';
import { requireActiveItem, resolveItemName } from '../store/references.js';
import { Ledger, INVENTORY_SECTION, type ListLedgerOptions } from '../ledger/ledger.js';
import { computeInventoryValuation, type ValuedItem } from '../aggregation/valuation.js';
import { planMovement } from './movement.js';
import {
  BatchMovementSchema,
  MovementInputSchema,
  type BatchLine,
  type InventoryEntry,
  type MovementInput,
} from './inventory-types.js';

interface PlannedMovement {
  action: InventoryAction;
  sku: string;
  item: ItemRecord;
  qty: number;
  note: string;
  stockAfter: number;
  amount: number;
  totalAfter: number;
}

export class InventoryLedger extends Ledger<InventoryMovementRecord> {
  constructor(store: RecordStore) {
    super(store, INVENTORY_SECTION, 'inventory');
  }

  /**
   * Apply one stock movement
   *
   * Business rules:
   * - Action is IN, OUT or ADJUST (case-insensitive)
   * - Item must exist and be enabled
   * - OUT cannot take stock below zero
   * - Resulting stock, amount and valuation must be safe integers
   *
   * @returns Id of the new ledger record
   * @throws {ValidationError} If the action or quantity is invalid
   * @throws {NotFoundError} If the SKU is unknown
   * @throws {DisabledEntityError} If the item is disabled
   * @throws {InsufficientStockError} If OUT exceeds the stock on hand
   */
  apply(input: MovementInput): string {
    const { action, sku, qty, note } = parseInput(MovementInputSchema, input);
    const item = requireActiveItem(this.store.data, sku);

    let movement: PlannedMovement;
    try {
      movement = this.plan(action, sku, item, qty, note, {});
    } catch (error) {
      if (error instanceof InsufficientStockError) {
        this.log.warn({ sku, available: error.available, requested: qty }, 'Movement rejected');
      }
      throw error;
    }

    const record = this.write(movement);
    this.store.commit();
    this.log.info(
      { id: record.id, action, sku, qty, stockAfter: record.stock_after },
      'Inventory movement applied'
    );

    return record.id;
  }

  /**
   * Apply several IN or OUT lines as one all-or-nothing operation.
   * Every line is planned before any is applied; OUT lines are checked
   * against the total requested per SKU across the batch.
   *
   * @returns Record ids in line order
   * @throws {ValidationError} If the action is not IN/OUT, a quantity is invalid, or a result is out of range
   */
  applyBatch(action: string, lines: BatchLine[]): string[] {
    const batch = parseInput(BatchMovementSchema, { action, lines });
    const data = this.store.data;

    const requested = new Map<string, number>();
    const pending: Record<string, ValuedItem> = {};
    const movements: PlannedMovement[] = [];

    for (const line of batch.lines) {
      const item = requireActiveItem(data, line.sku);
      if (batch.action === 'OUT') {
        const total = (requested.get(line.sku) ?? 0) + line.qty;
        if (item.stock < total) {
          this.log.warn({ sku: line.sku, available: item.stock, requested: total }, 'Batch rejected');
          throw new InsufficientStockError(line.sku, item.stock, total);
        }
        requested.set(line.sku, total);
      }

      const movement = this.plan(batch.action, line.sku, item, line.qty, line.note, pending);
      pending[line.sku] = { ...item, stock: movement.stockAfter };
      movements.push(movement);
    }

    if (movements.length === 0) {
      return [];
    }

    const ids = movements.map((movement) => this.write(movement).id);

    this.store.commit();
    this.log.info({ action: batch.action, lines: ids.length }, 'Inventory batch applied');

    return ids;
  }

  /**
   * Ledger rows with item name and category resolved for display.
   * Rows whose item was hard-deleted get a placeholder name.
   */
  listEntries(options: ListLedgerOptions = {}): InventoryEntry[] {
    const items = this.store.data.items;
    return this.list(options).map((record) => ({
      record,
      itemName: resolveItemName(this.store.data, record.sku),
      category: items[record.sku]?.category ?? '',
    }));
  }

  /**
   * Work out a movement against the current dataset plus `pending` item
   * states, without changing anything
   */
  private plan(
    action: InventoryAction,
    sku: string,
    item: ItemRecord,
    qty: number,
    note: string,
    pending: Record<string, ValuedItem>
  ): PlannedMovement {
    const stockBefore = pending[sku]?.stock ?? item.stock;
    const { stockAfter, amount } = planMovement(action, sku, stockBefore, item.unit_price, qty);
    const totalAfter = computeInventoryValuation(this.store.data.items, {
      ...pending,
      [sku]: { ...item, stock: stockAfter },
    });

    return { action, sku, item, qty, note, stockAfter, amount, totalAfter };
  }

  private write(movement: PlannedMovement): InventoryMovementRecord {
    const { action, sku, item, qty, note, stockAfter, amount, totalAfter } = movement;
    const ts = this.store.now();

    item.stock = stockAfter;
    item.updated_at = ts;

    const record: InventoryMovementRecord = {
      id: this.store.newId(INVENTORY_ID_PREFIX),
      ts,
      action,
      sku,
      qty,
      unit_price: item.unit_price,
      amount,
      stock_after: stockAfter,
      inventory_total_after: totalAfter,
      note,
      deleted: false,
    };

    this.append(record);
    return record;
  }
}
