#!/usr/bin/env tsx

/**
 * Copy the configured snapshot, byte for byte, to a timestamped backup file
 *
 * Usage:
 *   npm run backup
 *   STOCKBOOK_DATA_FILE=./data/shop.json STOCKBOOK_BACKUP_DIR=./backups npm run backup
 */

import { loadStockbookConfig } from '@stockbook/core';
import { backupSnapshot } from '@stockbook/database';

const config = loadStockbookConfig();

try {
  // Raw file copy: the store is not opened
  const target = backupSnapshot(config.dataFile, { backupDir: config.backupDir ?? undefined });

  console.log(`\n✅ Backup written to ${target}\n`);
} catch (error) {
  console.error('\n❌ Backup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
}
