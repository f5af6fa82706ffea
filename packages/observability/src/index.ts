/**
 * @tally/observability
 *
 * Structured logging for the ledger and its front ends.
 */

export { createLogger, stderrDestination, silentLogger } from './logger.js';
export type { Logger, LoggerOptions, DestinationStream } from './logger.js';
