/**
 * Text rendering of ledger results, shared by the subcommands and the menu
 */

import type {
  CategoryBreakdown,
  EditOutcome,
  ExportOutcome,
  MonthlySummary,
  PlotOutcome,
  Transaction,
} from '@tally/core';

export const NOT_FOUND = 'Not found.';
export const DELETED = 'Transaction deleted.';
export const PLOTTER_UNAVAILABLE = 'Plotting is not available; nothing was drawn.';

const money = (value: number) => value.toFixed(2);

export function formatTransactionTable(rows: Transaction[]): string[] {
  if (rows.length === 0) {
    return ['No transactions found.'];
  }

  const header = [
    'ID'.padStart(3),
    'Date'.padEnd(10),
    'Type'.padEnd(7),
    'Amount'.padStart(10),
    'Category'.padEnd(15),
    'Note',
  ].join(' ');

  return [
    header,
    '-'.repeat(70),
    ...rows.map((t) =>
      [
        String(t.id).padStart(3),
        t.date.padEnd(10),
        t.type.padEnd(7),
        money(t.amount).padStart(10),
        t.category.slice(0, 15).padEnd(15),
        t.note ?? '',
      ].join(' ')
    ),
  ];
}

export function formatSummary(summary: MonthlySummary): string {
  return (
    `Summary for ${summary.period}: ` +
    `Income: ${money(summary.income)}, ` +
    `Expenses: ${money(summary.expense)}, ` +
    `Balance: ${money(summary.balance)}`
  );
}

export function formatBreakdown(breakdown: CategoryBreakdown): string[] {
  if (breakdown.rows.length === 0) {
    return ['No category data for this period.'];
  }

  return [
    `Category breakdown for ${breakdown.period}:`,
    `${'Category'.padEnd(20)} ${'Type'.padEnd(8)} ${'Total'.padStart(10)}`,
    '-'.repeat(44),
    ...breakdown.rows.map(
      (row) => `${row.category.slice(0, 20).padEnd(20)} ${row.type.padEnd(8)} ${money(row.total).padStart(10)}`
    ),
  ];
}

export function formatAdded(transaction: Transaction): string {
  return `Added transaction #${transaction.id}.`;
}

export function formatEdit(outcome: EditOutcome): string {
  return outcome.updated ? 'Transaction updated.' : 'Nothing to update.';
}

export function formatExport(outcome: ExportOutcome): string {
  return outcome.written === 0 ? 'Nothing to export.' : `Exported ${outcome.written} rows to ${outcome.path}`;
}

/**
 * `null` when the plotter already drew the chart
 */
export function formatPlot(outcome: PlotOutcome): string | null {
  if (outcome.plotted) return null;
  return outcome.reason === 'no-data' ? 'No data to plot.' : PLOTTER_UNAVAILABLE;
}
