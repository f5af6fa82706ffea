import { describe, it, expect } from 'vitest';
import { TextPlotter, renderTrend } from '../text-plotter.js';
import { createRecordingTerminal } from '../test/helpers.js';

describe('renderTrend', () => {
  it('should scale bars to the largest value', () => {
    const lines = renderTrend(
      { labels: ['2024-01', '2024-02'], income: [100, 50], expense: [25, 0] },
      8
    );

    expect(lines).toEqual([
      'Monthly Income vs Expense',
      'Legend: # income  = expense',
      '',
      '2024-01 income  ######## 100.00',
      '        expense ==       25.00',
      '2024-02 income  ####     50.00',
      '        expense          0.00',
    ]);
  });

  it('should draw empty bars when every total is zero', () => {
    const lines = renderTrend({ labels: ['2024-01'], income: [0], expense: [0] }, 4);

    expect(lines.slice(3)).toEqual(['2024-01 income       0.00', '        expense      0.00']);
  });
});

describe('TextPlotter', () => {
  it('should print the chart to the terminal', () => {
    const terminal = createRecordingTerminal();

    new TextPlotter(terminal, 8).plot({ labels: ['2024-01'], income: [10], expense: [5] });

    expect(terminal.out).toEqual([
      'Monthly Income vs Expense',
      'Legend: # income  = expense',
      '',
      '2024-01 income  ######## 10.00',
      '        expense ====     5.00',
    ]);
  });
});
