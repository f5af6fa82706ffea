/**
 * CLI configuration
 *
 * Read from the environment (after dotenv has merged `.env`) and validated
 * with zod. The ledger itself only ever sees the resolved values.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

export const DEFAULT_DATABASE_FILE = '.finance_tracker.db';
export const DEFAULT_EXPORT_PATH = 'transactions_export.csv';

const EnvSchema = z.object({
  TALLY_DB_PATH: z.string().min(1).optional(),
  TALLY_EXPORT_PATH: z.string().min(1).default(DEFAULT_EXPORT_PATH),
  TALLY_PLOTTER: z.enum(['text', 'none']).default('text'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
});

export type PlotterKind = z.infer<typeof EnvSchema>['TALLY_PLOTTER'];
export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface CliConfig {
  databasePath: string;
  exportPath: string;
  plotter: PlotterKind;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * @param env - usually `process.env`
 * @param home - directory the default database file lives in
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): CliConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  const parsed = result.data;
  return {
    databasePath: parsed.TALLY_DB_PATH ?? join(home, DEFAULT_DATABASE_FILE),
    exportPath: parsed.TALLY_EXPORT_PATH,
    plotter: parsed.TALLY_PLOTTER,
    logLevel: parsed.LOG_LEVEL,
  };
}
