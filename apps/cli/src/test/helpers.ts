/**
 * Test helpers for the command line front ends
 */

import { createLedger } from '@tally/core';
import type { LedgerService, TrendPlotter } from '@tally/core';
import type { CliConfig } from '../config.js';
import type { CliContext } from '../context.js';
import type { Prompter } from '../interactive.js';
import type { Terminal } from '../terminal.js';

export const TEST_TODAY = new Date(2024, 0, 20);

export interface RecordingTerminal extends Terminal {
  out: string[];
  err: string[];
}

export function createRecordingTerminal(): RecordingTerminal {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    print: (line = '') => {
      out.push(line);
    },
    warn: (line) => {
      err.push(line);
    },
  };
}

export interface ScriptedPrompter extends Prompter {
  questions: string[];
  closed: boolean;
}

/**
 * Answers questions from a fixed script, then reports end of input
 */
export function createScriptedPrompter(answers: string[]): ScriptedPrompter {
  const remaining = [...answers];
  const prompter: ScriptedPrompter = {
    questions: [],
    closed: false,
    ask: async (question) => {
      prompter.questions.push(question);
      return remaining.shift() ?? null;
    },
    close: () => {
      prompter.closed = true;
    },
  };
  return prompter;
}

export function testConfig(overrides: Partial<CliConfig> = {}): CliConfig {
  return {
    databasePath: ':memory:',
    exportPath: 'transactions_export.csv',
    plotter: 'none',
    logLevel: 'silent',
    ...overrides,
  };
}

export function createTestContext(
  options: { plotter?: TrendPlotter; config?: Partial<CliConfig> } = {}
): CliContext & { ledger: LedgerService; terminal: RecordingTerminal } {
  const terminal = createRecordingTerminal();
  const ledger = createLedger({
    databasePath: ':memory:',
    plotter: options.plotter ?? null,
    clock: () => TEST_TODAY,
  });
  return { ledger, terminal, config: testConfig(options.config), clock: () => TEST_TODAY };
}
