/**
 * Settings Service
 *
 * Process-wide options and category colors. Every setter persists
 * immediately, like any other store mutation.
 */

import { z } from 'zod';
import {
  DEFAULT_SETTINGS,
  SettingsSchema,
  type CategoryColors,
  type SettingKey,
  type Settings,
} from '@stockbook/types';
import type { Logger } from '@stockbook/observability';
import type { RecordStore } from '../store/record-store.js';
import { parseInput } from '../store/validation.js';
import { formatMoney } from './money.js';
import { HEX_COLOR_PATTERN, foregroundFor, type ForegroundColor } from './colors.js';

const CategoryColorSchema = z.object({
  category: z.string().trim().min(1, 'Category is required'),
  color: z.string().trim().regex(HEX_COLOR_PATTERN, 'Color must be #RRGGBB'),
});

export class SettingsService {
  private readonly log: Logger;

  constructor(private readonly store: RecordStore) {
    this.log = store.moduleLogger('settings');
  }

  get<K extends SettingKey>(key: K): Settings[K] {
    return this.store.data.settings[key];
  }

  all(): Settings {
    return { ...this.store.data.settings };
  }

  /**
   * Change one setting
   *
   * @throws {ValidationError} If the value is out of range for that setting
   */
  set<K extends SettingKey>(key: K, value: Settings[K]): Settings {
    const next = parseInput(SettingsSchema, { ...this.store.data.settings, [key]: value });

    this.store.data.settings = next;
    this.store.commit();
    this.log.info({ key, value: next }, 'Setting changed');

    return { ...next };
  }

  reset(): Settings {
    this.store.data.settings = { ...DEFAULT_SETTINGS };
    this.store.commit();
    this.log.info('Settings reset to defaults');

    return this.all();
  }

  /**
   * Format an amount according to price_mode / price_decimals
   */
  formatMoney(value: number): string {
    const { price_mode, price_decimals } = this.store.data.settings;
    return formatMoney(value, { mode: price_mode, decimals: price_decimals });
  }

  /**
   * Whether typed confirmation matches the configured danger phrase.
   * The store never calls this itself; irreversible operations trust their caller.
   */
  matchesConfirmPhrase(input: string): boolean {
    return input === this.store.data.settings.danger_confirm_phrase;
  }

  /**
   * @throws {ValidationError} If the category is blank or the color is not #RRGGBB
   */
  setCategoryColor(category: string, color: string): void {
    const parsed = parseInput(CategoryColorSchema, { category, color });

    this.store.data.category_colors[parsed.category] = parsed.color;
    this.store.commit();
    this.log.info(parsed, 'Category color set');
  }

  getCategoryColor(category: string): string | null {
    return this.store.data.category_colors[category] ?? null;
  }

  categoryColors(): CategoryColors {
    return { ...this.store.data.category_colors };
  }

  foregroundFor(color: string): ForegroundColor {
    return foregroundFor(color);
  }
}
