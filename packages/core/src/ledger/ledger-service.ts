/**
 * Ledger Service
 *
 * The ledger store: every operation a front end can ask for. Validates input,
 * delegates to the repositories and logs what changed. Prints nothing.
 */

import { writeFile } from 'node:fs/promises';
import type { z } from 'zod';
import type { Logger } from '@tally/observability';
import { TransactionRepository } from '../transactions/transaction-repository.js';
import {
  ConstraintViolationError,
  ExportFailedError,
  InvalidPeriodError,
  PlotterUnavailableError,
  TransactionNotFoundError,
} from '../transactions/transaction-errors.js';
import {
  ListFiltersSchema,
  NewTransactionSchema,
  TransactionPatchSchema,
} from '../transactions/transaction-types.js';
import type {
  ListTransactionsInput,
  NewTransactionInput,
  Transaction,
  TransactionPatch,
} from '../transactions/transaction-types.js';
import { ReportRepository } from '../reports/report-repository.js';
import { formatPeriod, resolvePeriod, trailingWindowStart } from '../reports/period.js';
import type { CategoryBreakdown, MonthlySummary, MonthlyTrend } from '../reports/report-types.js';
import { transactionsToCsv } from './csv.js';
import { DEFAULT_TREND_MONTHS } from './ledger-types.js';
import type {
  EditOutcome,
  ExportOutcome,
  ExportRange,
  PlotOutcome,
  TrendPlotter,
} from './ledger-types.js';

export interface LedgerServiceOptions {
  logger: Logger;
  plotter: TrendPlotter | null;
  clock: () => Date;
  /** Releases whatever the repositories read from */
  onClose?: () => void;
}

const ExportRangeSchema = ListFiltersSchema.pick({ start: true, end: true });

export class LedgerService {
  private transactions: TransactionRepository;
  private reports: ReportRepository;
  private options: LedgerServiceOptions;

  constructor(
    transactions: TransactionRepository,
    reports: ReportRepository,
    options: LedgerServiceOptions
  ) {
    this.transactions = transactions;
    this.reports = reports;
    this.options = options;
  }

  private get logger(): Logger {
    return this.options.logger;
  }

  /**
   * Record a transaction and return it with its new id
   *
   * @throws ConstraintViolationError for a bad date, type, amount or category
   */
  async add(input: NewTransactionInput): Promise<Transaction> {
    const data = validate(NewTransactionSchema, input);
    const transaction = this.transactions.create(data);

    this.logger.info(
      { transactionId: transaction.id, type: transaction.type, amount: transaction.amount },
      'Transaction added'
    );
    return transaction;
  }

  /**
   * Transactions matching every given filter, newest first, at most `limit` (default 100)
   */
  async list(filters: ListTransactionsInput = {}): Promise<Transaction[]> {
    return this.transactions.list(validate(ListFiltersSchema, filters));
  }

  async get(id: number): Promise<Transaction | null> {
    return this.transactions.findById(id);
  }

  /**
   * Apply a sparse update. Fields left undefined keep their stored value.
   *
   * @throws TransactionNotFoundError when the id does not exist
   * @throws ConstraintViolationError when a supplied field is invalid
   */
  async edit(id: number, patch: TransactionPatch): Promise<EditOutcome> {
    const data = validate(TransactionPatchSchema, patch);
    const fields = Object.entries(data)
      .filter(([, value]) => value !== undefined)
      .map(([field]) => field);

    if (fields.length === 0) {
      this.logger.info({ transactionId: id }, 'Nothing to update');
      return { updated: false, reason: 'nothing-to-update' };
    }

    if (!this.transactions.findById(id)) {
      throw new TransactionNotFoundError(id);
    }

    this.transactions.update(id, data);
    const transaction = this.transactions.findById(id);
    if (!transaction) {
      throw new TransactionNotFoundError(id);
    }

    this.logger.info({ transactionId: id, fields }, 'Transaction updated');
    return { updated: true, transaction };
  }

  /**
   * Remove a transaction. Deleting an unknown id is a no-op.
   *
   * @returns whether a row was removed
   */
  async delete(id: number): Promise<boolean> {
    const removed = this.transactions.delete(id);
    this.logger.info({ transactionId: id, removed }, 'Transaction deleted');
    return removed;
  }

  /**
   * Income, expense and balance for a month (default: the current one)
   *
   * @throws InvalidPeriodError for a month outside 1-12 or a non-integer year
   */
  async monthlySummary(year?: number, month?: number): Promise<MonthlySummary> {
    const period = resolvePeriod(year, month, this.options.clock());
    const key = formatPeriod(period);
    const { income, expense } = this.reports.totalsByType(key);

    return {
      year: period.year,
      month: period.month,
      period: key,
      income,
      expense,
      balance: income - expense,
    };
  }

  /**
   * Per (category, type) totals for a month, largest first
   */
  async categoryBreakdown(year?: number, month?: number): Promise<CategoryBreakdown> {
    const key = formatPeriod(resolvePeriod(year, month, this.options.clock()));
    return { period: key, rows: this.reports.categoryTotals(key) };
  }

  /**
   * Write every transaction in the (inclusive) date range to a CSV file.
   * With nothing to write, no file is created.
   *
   * @throws ExportFailedError when the file cannot be written
   */
  async exportToCsv(path: string, range: ExportRange = {}): Promise<ExportOutcome> {
    const { start, end } = validate(ExportRangeSchema, range);
    const rows = this.transactions.list({ start, end, limit: null });

    if (rows.length === 0) {
      this.logger.info({ path }, 'Nothing to export');
      return { written: 0, path };
    }

    try {
      await writeFile(path, transactionsToCsv(rows), 'utf8');
    } catch (error) {
      this.logger.warn({ err: error, path }, 'Export failed');
      throw new ExportFailedError(path, { cause: error });
    }
    this.logger.info({ path, written: rows.length }, 'Transactions exported');
    return { written: rows.length, path };
  }

  /**
   * Monthly income/expense totals over the trailing `pastMonths` months
   */
  async monthlyTrend(pastMonths: number = DEFAULT_TREND_MONTHS): Promise<MonthlyTrend> {
    if (!Number.isInteger(pastMonths) || pastMonths < 1) {
      throw new InvalidPeriodError(`months must be a positive integer, got ${pastMonths}`);
    }
    const since = trailingWindowStart(this.options.clock(), pastMonths);
    return this.reports.monthlyTotals(since);
  }

  /**
   * Hand the trailing trend to the plotting collaborator. A missing or
   * unavailable plotter is reported as a warning, never as a failure.
   */
  async plotMonthly(pastMonths: number = DEFAULT_TREND_MONTHS): Promise<PlotOutcome> {
    const { plotter } = this.options;
    if (!plotter) {
      this.logger.warn('No plotter configured; skipping plot');
      return { plotted: false, reason: 'plotter-unavailable' };
    }

    const trend = await this.monthlyTrend(pastMonths);
    if (trend.labels.length === 0) {
      return { plotted: false, reason: 'no-data' };
    }

    try {
      await plotter.plot(trend);
    } catch (error) {
      if (error instanceof PlotterUnavailableError) {
        this.logger.warn({ err: error }, 'Plotter unavailable; skipping plot');
        return { plotted: false, reason: 'plotter-unavailable' };
      }
      throw error;
    }

    return { plotted: true, trend };
  }

  close(): void {
    this.options.onClose?.();
  }
}

/**
 * Parse with a zod schema, turning failures into ConstraintViolationError
 */
function validate<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new ConstraintViolationError(
      result.error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    );
  }

  return result.data;
}

