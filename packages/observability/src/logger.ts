import pino from 'pino';

/**
 * Redact free-text transaction notes from logs.
 * Amounts, kinds, categories and dates stay visible for troubleshooting.
 */
const REDACTION_PATHS = [
  'description',
  'transaction.description',
  'transactions[*].description',
  'input.description',
];

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels (LOG_LEVEL)
 * - Redaction of transaction descriptions
 * - Standard error serialization under `err`
 * - ISO 8601 timestamps
 *
 * Pass a destination to send output somewhere other than stdout
 * (the CLI uses stderrDestination() so logs never mix with menu output).
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const settings: pino.LoggerOptions = {
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

  return destination ? pino(settings, destination) : pino(settings);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Synchronous stderr destination, so lines are flushed before the CLI exits.
 */
export function stderrDestination() {
  return pino.destination({ dest: 2, sync: true });
}
