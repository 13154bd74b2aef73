/**
 * Settings Domain
 */

export { SettingsService } from './settings-service.js';
export { formatMoney } from './money.js';
export type { MoneyFormat } from './money.js';
export { foregroundFor, HEX_COLOR_PATTERN } from './colors.js';
export type { ForegroundColor } from './colors.js';
