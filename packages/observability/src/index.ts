/**
 * @stockbook/observability
 *
 * Structured logging for the record store, built on Pino.
 */

export { createLogger, logger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
