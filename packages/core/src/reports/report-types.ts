/**
 * Report Domain Types
 */

import type { TransactionType } from '../transactions/transaction-types.js';

export interface MonthlySummary {
  year: number;
  month: number;
  /** `YYYY-MM` */
  period: string;
  income: number;
  expense: number;
  /** income − expense */
  balance: number;
}

export interface CategoryTotal {
  category: string;
  type: TransactionType;
  total: number;
}

export interface CategoryBreakdown {
  period: string;
  rows: CategoryTotal[];
}

/**
 * Parallel series, one entry per `YYYY-MM` label
 */
export interface MonthlyTrend {
  labels: string[];
  income: number[];
  expense: number[];
}

export interface TypeTotals {
  income: number;
  expense: number;
}
