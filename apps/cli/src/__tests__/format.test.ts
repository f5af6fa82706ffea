import { describe, it, expect } from 'vitest';
import {
  PLOTTER_UNAVAILABLE,
  formatAdded,
  formatBreakdown,
  formatEdit,
  formatExport,
  formatPlot,
  formatSummary,
  formatTransactionTable,
} from '../format.js';

describe('formatTransactionTable', () => {
  it('should render aligned columns with a truncated category', () => {
    const lines = formatTransactionTable([
      { id: 1, date: '2024-01-05', type: 'income', amount: 1000, category: 'salary', note: null },
      { id: 12, date: '2024-01-10', type: 'expense', amount: 12.5, category: 'eating out with friends', note: 'lunch' },
    ]);

    expect(lines).toEqual([
      ' ID Date       Type        Amount Category        Note',
      '-'.repeat(70),
      '  1 2024-01-05 income     1000.00 salary          ',
      ' 12 2024-01-10 expense      12.50 eating out with lunch',
    ]);
  });

  it('should say so when there is nothing to show', () => {
    expect(formatTransactionTable([])).toEqual(['No transactions found.']);
  });
});

describe('formatSummary', () => {
  it('should print two decimals for every figure', () => {
    expect(
      formatSummary({ year: 2024, month: 1, period: '2024-01', income: 1000, expense: 200, balance: 800 })
    ).toBe('Summary for 2024-01: Income: 1000.00, Expenses: 200.00, Balance: 800.00');
  });
});

describe('formatBreakdown', () => {
  it('should render a titled table', () => {
    expect(
      formatBreakdown({
        period: '2024-01',
        rows: [
          { category: 'salary', type: 'income', total: 1000 },
          { category: 'food', type: 'expense', total: 200 },
        ],
      })
    ).toEqual([
      'Category breakdown for 2024-01:',
      'Category             Type          Total',
      '-'.repeat(44),
      'salary               income      1000.00',
      'food                 expense      200.00',
    ]);
  });

  it('should say so for an empty month', () => {
    expect(formatBreakdown({ period: '2024-01', rows: [] })).toEqual(['No category data for this period.']);
  });
});

describe('outcome messages', () => {
  it('should describe each outcome', () => {
    expect(
      formatAdded({ id: 3, date: '2024-01-05', type: 'income', amount: 1, category: 'x', note: null })
    ).toBe('Added transaction #3.');
    expect(formatEdit({ updated: false, reason: 'nothing-to-update' })).toBe('Nothing to update.');
    expect(formatExport({ written: 0, path: 'a.csv' })).toBe('Nothing to export.');
    expect(formatExport({ written: 2, path: 'a.csv' })).toBe('Exported 2 rows to a.csv');
    expect(formatPlot({ plotted: false, reason: 'no-data' })).toBe('No data to plot.');
    expect(formatPlot({ plotted: false, reason: 'plotter-unavailable' })).toBe(PLOTTER_UNAVAILABLE);
    expect(formatPlot({ plotted: true, trend: { labels: [], income: [], expense: [] } })).toBeNull();
  });
});
