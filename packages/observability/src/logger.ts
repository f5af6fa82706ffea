import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger, LoggerOptions, DestinationStream };

/**
 * Create a structured logger instance with Pino
 *
 * - Level from `options.level`, then `LOG_LEVEL`, then `info`
 * - ISO 8601 timestamps
 * - `service` base field so ledger logs can be told apart when piped elsewhere
 * - Errors logged under `err` keep their type, message and stack
 */
export function createLogger(options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const resolved: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    base: { service: 'tally' },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(resolved, destination) : pino(resolved);
}

/**
 * Synchronous stderr stream, so a command line keeps stdout for its report
 */
export function stderrDestination(): DestinationStream {
  return pino.destination({ fd: 2, sync: true });
}

/**
 * Logger that drops everything; the default when a caller injects none
 */
export const silentLogger: Logger = pino({ level: 'silent' });
