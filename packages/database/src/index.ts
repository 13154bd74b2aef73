/**
 * @stockbook/database
 *
 * Snapshot persistence: codec, normalizer, ids and timestamps.
 */

export { loadSnapshot, saveSnapshot, backupSnapshot } from './snapshot-codec.js';
export type { LoadSnapshotOptions, BackupSnapshotOptions } from './snapshot-codec.js';

export { createDefaultDataset, normalizeSnapshot } from './normalize.js';
export type { NormalizeOptions } from './normalize.js';

export {
  formatTimestamp,
  formatCompactTimestamp,
  newRecordId,
  systemClock,
  INVENTORY_ID_PREFIX,
  SALES_ID_PREFIX,
} from './timestamps.js';
export type { Clock } from './timestamps.js';

export { SnapshotError, CorruptSnapshotError, MissingSnapshotError } from './errors.js';
