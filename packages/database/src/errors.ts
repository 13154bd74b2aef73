/**
 * Snapshot Errors
 *
 * Failures reading or copying the persisted snapshot file.
 */

export class SnapshotError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SnapshotError';
  }
}

export class CorruptSnapshotError extends SnapshotError {
  constructor(
    readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Snapshot is unreadable: ${path} (${reason})`, options);
    this.name = 'CorruptSnapshotError';
  }
}

export class MissingSnapshotError extends SnapshotError {
  constructor(readonly path: string) {
    super(`Snapshot file does not exist: ${path}`);
    this.name = 'MissingSnapshotError';
  }
}
