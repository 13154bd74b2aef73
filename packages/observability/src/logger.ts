import pino from 'pino';

export type Logger = pino.Logger;
export type LoggerOptions = pino.LoggerOptions;

/**
 * Paths redacted from every log line.
 * The confirmation phrase guards irreversible operations and stays out of logs.
 */
const REDACTION_PATHS = [
  'danger_confirm_phrase',
  'settings.danger_confirm_phrase',
  'value.danger_confirm_phrase',
];

/**
 * Create a structured logger instance with Pino
 *
 * - Level from LOG_LEVEL (default "info")
 * - ISO 8601 timestamps
 * - Standard error serializer under `err`
 *
 * An optional destination stream is mostly useful for capturing output in tests.
 */
export function createLogger(options?: LoggerOptions, destination?: pino.DestinationStream): Logger {
  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
