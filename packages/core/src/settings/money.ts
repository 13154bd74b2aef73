import type { PriceMode } from '@stockbook/types';

export interface MoneyFormat {
  mode: PriceMode;
  decimals: number;
}

/**
 * Thousands-separated amount. "int" rounds to a whole number, "float" shows
 * exactly `decimals` places.
 */
export function formatMoney(value: number, format: MoneyFormat): string {
  if (format.mode === 'float') {
    return new Intl.NumberFormat('en-US', {
      minimumFractionDigits: format.decimals,
      maximumFractionDigits: format.decimals,
    }).format(value);
  }

  // `|| 0` folds -0 into 0 so small negatives do not print as "-0"
  const rounded = Math.round(value) || 0;
  return new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 }).format(rounded);
}
