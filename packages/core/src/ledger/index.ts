/**
 * Ledger Store
 *
 * `createLedger` is the entry point front ends use.
 */

export { createLedger } from './create-ledger.js';
export { LedgerService } from './ledger-service.js';
export type { LedgerServiceOptions } from './ledger-service.js';
export { transactionsToCsv, CSV_COLUMNS } from './csv.js';
export { DEFAULT_TREND_MONTHS } from './ledger-types.js';
export type {
  TrendPlotter,
  LedgerOptions,
  EditOutcome,
  ExportRange,
  ExportOutcome,
  PlotOutcome,
} from './ledger-types.js';
