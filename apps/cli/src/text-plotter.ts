import type { MonthlyTrend, TrendPlotter } from '@tally/core';
import { printLines } from './terminal.js';
import type { Terminal } from './terminal.js';

export const DEFAULT_BAR_WIDTH = 40;

/**
 * Draws the monthly trend as paired horizontal bars, income `#` and expense `=`,
 * scaled so the largest value spans `width` characters.
 */
export class TextPlotter implements TrendPlotter {
  constructor(
    private terminal: Terminal,
    private width: number = DEFAULT_BAR_WIDTH
  ) {}

  plot(trend: MonthlyTrend): void {
    printLines(this.terminal, renderTrend(trend, this.width));
  }
}

export function renderTrend(trend: MonthlyTrend, width: number): string[] {
  const peak = Math.max(0, ...trend.income, ...trend.expense);
  const bar = (char: string, value: number) =>
    (peak > 0 ? char.repeat(Math.round((value / peak) * width)) : '').padEnd(width);

  const lines = ['Monthly Income vs Expense', 'Legend: # income  = expense', ''];

  trend.labels.forEach((label, index) => {
    const income = trend.income[index] ?? 0;
    const expense = trend.expense[index] ?? 0;
    const blank = ' '.repeat(label.length);

    lines.push(`${label} ${'income'.padEnd(7)} ${bar('#', income)} ${income.toFixed(2)}`);
    lines.push(`${blank} ${'expense'.padEnd(7)} ${bar('=', expense)} ${expense.toFixed(2)}`);
  });

  return lines;
}
