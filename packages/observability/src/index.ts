/**
 * @ledger/observability
 *
 * Structured logging for the ledger packages and CLI.
 */

export { createLogger, stderrDestination } from './logger.js';
export type { Logger } from './logger.js';
