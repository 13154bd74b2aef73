import { resolve } from 'node:path';

const DEFAULT_DATA_FILE = 'stockbook.json';

export type StockbookConfig = {
  /** Absolute path of the snapshot file */
  dataFile: string;
  /** Where backups go; null keeps them beside the snapshot */
  backupDir: string | null;
};

/**
 * Read store configuration from the environment
 *
 * - STOCKBOOK_DATA_FILE: snapshot path, relative paths resolve against `cwd`
 * - STOCKBOOK_BACKUP_DIR: optional backup directory
 *
 * LOG_LEVEL is read by the logger itself.
 */
export function loadStockbookConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): StockbookConfig {
  const dataFile = env.STOCKBOOK_DATA_FILE?.trim() || DEFAULT_DATA_FILE;
  const backupDir = env.STOCKBOOK_BACKUP_DIR?.trim();

  return {
    dataFile: resolve(cwd, dataFile),
    backupDir: backupDir ? resolve(cwd, backupDir) : null,
  };
}
