import type { ItemRecord } from '@stockbook/types';
import { requireSafeInteger } from '../store/validation.js';

export type ValuedItem = Pick<ItemRecord, 'stock' | 'unit_price' | 'disabled'>;

/**
 * Σ stock × unit_price over enabled items, computed fresh on every call.
 *
 * `changes` overlays pending item states by SKU, so a mutation can check the
 * valuation it would produce before touching the dataset.
 *
 * @throws {ValidationError} If an item value or the total is not a safe integer
 */
export function computeInventoryValuation(
  items: Record<string, ValuedItem>,
  changes: Record<string, ValuedItem> = {}
): number {
  let total = 0;
  for (const [sku, item] of Object.entries({ ...items, ...changes })) {
    if (item.disabled) continue;
    const value = requireSafeInteger(item.stock * item.unit_price, `Value of ${sku}`);
    total = requireSafeInteger(total + value, 'Inventory valuation');
  }
  return total;
}
