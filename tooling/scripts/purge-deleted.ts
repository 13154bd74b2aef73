#!/usr/bin/env tsx

/**
 * Permanently remove soft-deleted inventory and sales records
 * Asks for the configured confirmation phrase and takes a backup first
 *
 * Usage:
 *   npm run purge
 */

import * as readline from 'readline';
import { Stockbook, loadStockbookConfig } from '@stockbook/core';
import { backupSnapshot } from '@stockbook/database';

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

function question(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, (answer) => {
      resolve(answer.trim());
    });
  });
}

async function main() {
  const config = loadStockbookConfig();
  const preview = Stockbook.open(config.dataFile, { readOnly: true });

  const inventoryDeleted = preview.inventory.list({ includeDeleted: true }).filter((r) => r.deleted);
  const salesDeleted = preview.sales.list({ includeDeleted: true }).filter((r) => r.deleted);

  console.log('\n🗑️  Purge deleted records\n');
  console.log('File:', config.dataFile);
  console.log('Soft-deleted inventory records:', inventoryDeleted.length);
  console.log('Soft-deleted sales records:', salesDeleted.length);

  if (inventoryDeleted.length === 0 && salesDeleted.length === 0) {
    console.log('\n✅ Nothing to purge\n');
    rl.close();
    return;
  }

  console.log('\n⚠️  This cannot be undone.');
  const answer = await question('Type the confirmation phrase to continue: ');
  if (!preview.settings.matchesConfirmPhrase(answer)) {
    console.log('\n❌ Confirmation phrase did not match; nothing was removed\n');
    rl.close();
    process.exit(1);
  }

  const backup = backupSnapshot(config.dataFile, { backupDir: config.backupDir ?? undefined });
  console.log(`\n💾 Backup written to ${backup}`);

  const book = Stockbook.open(config.dataFile);
  const inventoryRemoved = book.inventory.purgeDeleted();
  const salesRemoved = book.sales.purgeDeleted();

  console.log(`\n✅ Removed ${inventoryRemoved} inventory and ${salesRemoved} sales record(s)\n`);
  rl.close();
}

main().catch((error) => {
  console.error('\n❌ Error:', error);
  rl.close();
  process.exit(1);
});
