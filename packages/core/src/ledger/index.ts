/**
 * Ledger domain logic
 *
 * Shared soft-delete subsystem for the append-mostly ledgers:
 * - Soft delete with reason and timestamp, restore
 * - Hard delete of single records and purge of deleted ones
 * - Listing in timestamp order with or without deleted entries
 */

export { Ledger, INVENTORY_SECTION, SALES_SECTION, sortByTimestamp } from './ledger.js';
export type { LedgerSection, ListLedgerOptions } from './ledger.js';
