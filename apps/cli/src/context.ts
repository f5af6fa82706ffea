import type { LedgerService } from '@tally/core';
import type { CliConfig } from './config.js';
import type { Terminal } from './terminal.js';

/**
 * What a front end needs to serve one session
 */
export interface CliContext {
  ledger: LedgerService;
  terminal: Terminal;
  config: CliConfig;
  clock: () => Date;
}
