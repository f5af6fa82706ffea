/**
 * Report Repository
 *
 * Aggregation queries over `transactions`, keyed by the date's `YYYY-MM`.
 */

import type { SqliteDatabase } from '@tally/database';
import { TransactionTypeSchema } from '../transactions/transaction-types.js';
import type { CategoryTotal, MonthlyTrend, TypeTotals } from './report-types.js';

interface TypeTotalRow {
  type: string;
  total: number;
}

interface CategoryTotalRow {
  category: string;
  type: string;
  total: number;
}

interface MonthTotalRow {
  ym: string;
  type: string;
  total: number;
}

export class ReportRepository {
  constructor(private db: SqliteDatabase) {}

  /**
   * Income and expense sums for one `YYYY-MM`; a side with no rows is 0
   */
  totalsByType(period: string): TypeTotals {
    const rows = this.db
      .prepare<[string], TypeTotalRow>(
        `SELECT type, SUM(amount) AS total
         FROM transactions
         WHERE strftime('%Y-%m', date) = ?
         GROUP BY type`
      )
      .all(period);

    const totals: TypeTotals = { income: 0, expense: 0 };
    for (const row of rows) {
      totals[TransactionTypeSchema.parse(row.type)] = row.total;
    }
    return totals;
  }

  /**
   * Per (category, type) sums for one `YYYY-MM`, largest first
   */
  categoryTotals(period: string): CategoryTotal[] {
    return this.db
      .prepare<[string], CategoryTotalRow>(
        `SELECT category, type, SUM(amount) AS total
         FROM transactions
         WHERE strftime('%Y-%m', date) = ?
         GROUP BY category, type
         ORDER BY total DESC, category ASC, type ASC`
      )
      .all(period)
      .map((row) => ({
        category: row.category,
        type: TransactionTypeSchema.parse(row.type),
        total: row.total,
      }));
  }

  /**
   * Month-by-month sums for rows dated on or after `since`
   */
  monthlyTotals(since: string): MonthlyTrend {
    const rows = this.db
      .prepare<[string], MonthTotalRow>(
        `SELECT strftime('%Y-%m', date) AS ym, type, SUM(amount) AS total
         FROM transactions
         WHERE date >= ?
         GROUP BY ym, type
         HAVING ym IS NOT NULL
         ORDER BY ym`
      )
      .all(since);

    const byMonth = new Map<string, TypeTotals>();
    for (const row of rows) {
      const totals = byMonth.get(row.ym) ?? { income: 0, expense: 0 };
      totals[TransactionTypeSchema.parse(row.type)] = row.total;
      byMonth.set(row.ym, totals);
    }

    const labels = [...byMonth.keys()];
    return {
      labels,
      income: labels.map((label) => byMonth.get(label)?.income ?? 0),
      expense: labels.map((label) => byMonth.get(label)?.expense ?? 0),
    };
  }
}
