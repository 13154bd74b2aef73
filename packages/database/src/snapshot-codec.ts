/**
 * Snapshot Codec
 *
 * Reads and writes the whole dataset as one JSON document. Writes go to a
 * sibling temp file that is fsynced and then renamed over the target, so an
 * interrupted save leaves the previous snapshot intact.
 */

import {
  closeSync,
  copyFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { StoredSnapshotSchema, formatIssues, type Dataset } from '@stockbook/types';
import { CorruptSnapshotError, MissingSnapshotError } from './errors.js';
import { createDefaultDataset, normalizeSnapshot } from './normalize.js';
import {
  formatCompactTimestamp,
  formatTimestamp,
  systemClock,
  type Clock,
} from './timestamps.js';

export interface LoadSnapshotOptions {
  clock?: Clock;
  /** Fail with MissingSnapshotError instead of returning a default dataset */
  mustExist?: boolean;
  newId?: (prefix: string) => string;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export interface BackupSnapshotOptions {
  /** Defaults to the directory holding the snapshot */
  backupDir?: string;
  clock?: Clock;
}

/**
 * Load and normalize the snapshot at `path`.
 * A missing file yields a fresh default dataset unless `mustExist` is set.
 *
 * @throws {CorruptSnapshotError} If the file is not UTF-8 JSON or a section has the wrong shape
 * @throws {MissingSnapshotError} If the file is absent and `mustExist` is set
 */
export function loadSnapshot(path: string, options: LoadSnapshotOptions = {}): Dataset {
  if (!existsSync(path)) {
    if (options.mustExist) {
      throw new MissingSnapshotError(path);
    }
    return createDefaultDataset();
  }

  let raw: string;
  try {
    raw = utf8.decode(readFileSync(path));
  } catch (error) {
    throw new CorruptSnapshotError(path, 'not valid UTF-8', { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CorruptSnapshotError(path, 'not valid JSON', { cause: error });
  }

  const result = StoredSnapshotSchema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptSnapshotError(path, formatIssues(result.error), { cause: result.error });
  }

  const clock = options.clock ?? systemClock;
  return normalizeSnapshot(result.data, {
    now: formatTimestamp(clock()),
    ...(options.newId && { newId: options.newId }),
  });
}

/**
 * Persist the dataset with write-temp-then-rename.
 * Creates the parent directory when absent.
 */
export function saveSnapshot(path: string, dataset: Dataset): void {
  mkdirSync(dirname(path), { recursive: true });

  const tmpPath = `${path}.tmp`;
  const body = `${JSON.stringify(dataset, null, 2)}\n`;
  let tmpCreated = false;

  try {
    const fd = openSync(tmpPath, 'w');
    tmpCreated = true;
    try {
      writeFileSync(fd, body, 'utf8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, path);
  } catch (error) {
    if (tmpCreated) {
      rmSync(tmpPath, { force: true });
    }
    throw error;
  }
}

/**
 * Copy the snapshot to `<name>.backup_<YYYYMMDD_HHMMSS>`. Never touches the source.
 *
 * @returns Path of the backup file
 * @throws {MissingSnapshotError} If there is no snapshot to copy
 */
export function backupSnapshot(path: string, options: BackupSnapshotOptions = {}): string {
  if (!existsSync(path)) {
    throw new MissingSnapshotError(path);
  }

  const clock = options.clock ?? systemClock;
  const backupDir = options.backupDir ?? dirname(path);
  mkdirSync(backupDir, { recursive: true });

  const target = join(backupDir, `${basename(path)}.backup_${formatCompactTimestamp(clock())}`);
  copyFileSync(path, target);
  return target;
}
