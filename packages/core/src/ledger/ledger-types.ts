/**
 * Ledger Store Types
 */

import type { Logger } from '@tally/observability';
import type { Transaction } from '../transactions/transaction-types.js';
import type { MonthlyTrend } from '../reports/report-types.js';

/**
 * Renders a monthly trend somewhere a person can see it.
 * Throw `PlotterUnavailableError` when the output cannot be produced.
 */
export interface TrendPlotter {
  plot(trend: MonthlyTrend): void | Promise<void>;
}

export interface LedgerOptions {
  /** SQLite file path, or `:memory:` */
  databasePath: string;
  logger?: Logger;
  /** `null` or omitted means no plotting collaborator */
  plotter?: TrendPlotter | null;
  /** Source of "today" for default periods and trailing windows */
  clock?: () => Date;
}

export type EditOutcome =
  | { updated: true; transaction: Transaction }
  | { updated: false; reason: 'nothing-to-update' };

export interface ExportRange {
  start?: string;
  end?: string;
}

export interface ExportOutcome {
  /** Rows written; 0 means no file was created */
  written: number;
  path: string;
}

export type PlotOutcome =
  | { plotted: true; trend: MonthlyTrend }
  | { plotted: false; reason: 'plotter-unavailable' | 'no-data' };

export const DEFAULT_TREND_MONTHS = 12;
