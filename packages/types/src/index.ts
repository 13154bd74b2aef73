/**
 * @stockbook/types
 *
 * zod schemas and inferred types for the snapshot document and store settings.
 */

export * from './settings.schema.js';
export * from './master.schema.js';
export * from './ledger.schema.js';
export * from './snapshot.schema.js';
export { formatIssues } from './format-issues.js';
