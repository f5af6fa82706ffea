/**
 * Tally command line
 *
 * Resolves configuration, opens the ledger and hands control to either the
 * subcommand runner or the interactive menu.
 */

import { createLedger, StorageUnavailableError } from '@tally/core';
import type { LedgerService } from '@tally/core';
import { createLogger, stderrDestination } from '@tally/observability';
import type { DestinationStream } from '@tally/observability';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, runCommand } from './commands.js';
import { ConfigError, loadConfig } from './config.js';
import type { CliConfig } from './config.js';
import type { CliContext } from './context.js';
import { createReadlinePrompter, runInteractive } from './interactive.js';
import type { Prompter } from './interactive.js';
import { consoleTerminal } from './terminal.js';
import type { Terminal } from './terminal.js';
import { TextPlotter } from './text-plotter.js';

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  terminal?: Terminal;
  /** Used when no command is given; defaults to stdin */
  prompter?: Prompter;
  clock?: () => Date;
  /** Log sink; defaults to stderr */
  logDestination?: DestinationStream;
}

const HELP_FLAGS = new Set(['help', '--help', '-h']);

/**
 * @returns the process exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const terminal = options.terminal ?? consoleTerminal;
  const clock = options.clock ?? (() => new Date());
  const [command, ...args] = argv;

  if (command !== undefined && HELP_FLAGS.has(command)) {
    terminal.print(USAGE);
    return EXIT_OK;
  }

  let config: CliConfig;
  try {
    config = loadConfig(options.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      terminal.warn(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }

  const logger = createLogger(
    { level: config.logLevel, base: { service: 'tally-cli' } },
    options.logDestination ?? stderrDestination()
  );

  let ledger: LedgerService;
  try {
    ledger = createLedger({
      databasePath: config.databasePath,
      logger,
      plotter: config.plotter === 'text' ? new TextPlotter(terminal) : null,
      clock,
    });
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      logger.error({ err: error }, 'Ledger database unavailable');
      terminal.warn(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const ctx: CliContext = { ledger, terminal, config, clock };

  try {
    if (command === undefined) {
      await runInteractive(ctx, options.prompter ?? createReadlinePrompter());
      return EXIT_OK;
    }
    return await runCommand(command, args, ctx);
  } catch (error) {
    logger.error({ err: error, command }, 'Unexpected failure');
    throw error;
  } finally {
    ledger.close();
  }
}
