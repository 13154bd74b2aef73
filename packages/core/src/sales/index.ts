/**
 * Sales Domain
 */

export { SalesLedger } from './sales-ledger.js';
export { SaleInputSchema } from './sales-types.js';
export type { SaleInput, SalesLine, SalesEntry } from './sales-types.js';
