/**
 * Store settings schemas
 * Persisted under `settings` in the snapshot and edited through the settings service
 */

import { z } from 'zod';

export const PRICE_MODES = ['int', 'float'] as const;

export const PriceModeSchema = z.enum(PRICE_MODES);

export type PriceMode = z.infer<typeof PriceModeSchema>;

/**
 * Complete settings shape
 * - theme: display hint, opaque to the store
 * - price_decimals: only used when price_mode is "float"
 * - danger_confirm_phrase: typed back by the user before irreversible operations
 */
export const SettingsSchema = z.object({
  theme: z.string(),
  price_mode: PriceModeSchema,
  price_decimals: z
    .number()
    .int('Decimal places must be a whole number')
    .min(0, 'Decimal places cannot be negative')
    .max(6, 'Decimal places cannot exceed 6'),
  danger_confirm_phrase: z.string().trim().min(1, 'Confirmation phrase is required'),
  show_deleted_by_default: z.boolean(),
});

export type Settings = z.infer<typeof SettingsSchema>;

export type SettingKey = keyof Settings;

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  theme: '',
  price_mode: 'int',
  price_decimals: 2,
  danger_confirm_phrase: 'DELETE',
  show_deleted_by_default: false,
});

/**
 * Lenient variant used when reading a snapshot: each unreadable or missing key
 * falls back to its default on its own, and a non-object falls back wholesale.
 */
export const StoredSettingsSchema = z
  .object({
    theme: SettingsSchema.shape.theme.catch(DEFAULT_SETTINGS.theme),
    price_mode: SettingsSchema.shape.price_mode.catch(DEFAULT_SETTINGS.price_mode),
    price_decimals: SettingsSchema.shape.price_decimals.catch(DEFAULT_SETTINGS.price_decimals),
    danger_confirm_phrase: SettingsSchema.shape.danger_confirm_phrase.catch(
      DEFAULT_SETTINGS.danger_confirm_phrase
    ),
    show_deleted_by_default: SettingsSchema.shape.show_deleted_by_default.catch(
      DEFAULT_SETTINGS.show_deleted_by_default
    ),
  })
  .catch(() => ({ ...DEFAULT_SETTINGS }));
