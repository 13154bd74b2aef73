#!/usr/bin/env tsx

/**
 * Print record counts and headline figures for the configured snapshot
 * Opens the store read-only: the data file is never written
 *
 * Usage:
 *   npm run summary
 *   npm run summary -- 2026-01-01 2026-01-31
 */

import { Stockbook, dayRange, loadStockbookConfig } from '@stockbook/core';

const [from, to] = process.argv.slice(2);
const config = loadStockbookConfig();

try {
  const book = Stockbook.open(config.dataFile, { readOnly: true });
  const range = dayRange(from, to);
  const money = (value: number) => book.settings.formatMoney(value);

  const items = book.items.list({ includeDisabled: true });
  const customers = book.customers.list({ includeDisabled: true });

  console.log('\n📦 Snapshot Summary\n');
  console.log('File:', config.dataFile);
  console.log(
    'Items:',
    items.length,
    `(${items.filter((item) => item.disabled).length} disabled)`
  );
  console.log(
    'Customers:',
    customers.length,
    `(${customers.filter((customer) => customer.disabled).length} disabled)`
  );
  console.log(
    'Inventory records:',
    book.inventory.list({ includeDeleted: true }).length,
    `(${book.inventory.list().length} active)`
  );
  console.log(
    'Sales records:',
    book.sales.list({ includeDeleted: true }).length,
    `(${book.sales.list().length} active)`
  );

  console.log('\n💰 Figures\n');
  console.log('Inventory valuation:', money(book.aggregates.inventoryValuation()));
  console.log(
    `Sales${from || to ? ` ${from ?? '…'} → ${to ?? '…'}` : ''}:`,
    money(book.aggregates.salesSum(range))
  );

  const byCustomer = book.aggregates.salesByCustomer(range).filter((row) => row.total !== 0);
  if (byCustomer.length > 0) {
    console.log('\n👥 Sales by customer\n');
    for (const row of byCustomer) {
      console.log(`  ${row.cid.padEnd(12)} ${row.name.padEnd(24)} ${money(row.total)}`);
    }
  }

  console.log('');
} catch (error) {
  console.error('\n❌ Could not summarize snapshot:', error instanceof Error ? error.message : error);
  process.exit(1);
}
