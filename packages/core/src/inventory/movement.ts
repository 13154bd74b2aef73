import type { InventoryAction } from '@stockbook/types';
import { InsufficientStockError } from '../store/store-errors.js';
import { requireSafeInteger } from '../store/validation.js';

export interface MovementPlan {
  stockAfter: number;
  /** Signed change in inventory value caused by this movement */
  amount: number;
}

function resultingStock(action: InventoryAction, sku: string, stockBefore: number, qty: number): number {
  switch (action) {
    case 'IN':
      return stockBefore + qty;

    case 'OUT':
      if (stockBefore < qty) {
        throw new InsufficientStockError(sku, stockBefore, qty);
      }
      return stockBefore - qty;

    case 'ADJUST':
      // qty is the new absolute level
      return qty;
  }
}

/**
 * Compute the resulting stock and value delta of one movement without applying it.
 *
 * @throws {InsufficientStockError} If an OUT movement exceeds the stock on hand
 * @throws {ValidationError} If the resulting stock or amount is not a safe integer
 */
export function planMovement(
  action: InventoryAction,
  sku: string,
  stockBefore: number,
  unitPrice: number,
  qty: number
): MovementPlan {
  const stockAfter = requireSafeInteger(
    resultingStock(action, sku, stockBefore, qty),
    `Stock of ${sku}`
  );
  const amount = requireSafeInteger((stockAfter - stockBefore) * unitPrice, `Amount for ${sku}`);

  // `|| 0` keeps a zero-price OUT from recording -0
  return { stockAfter, amount: amount || 0 };
}
