/**
 * End-to-end runs of the command line against a database file in a temp dir
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE } from '../commands.js';
import { HELP } from '../interactive.js';
import { main } from '../main.js';
import { TEST_TODAY, createRecordingTerminal, createScriptedPrompter } from '../test/helpers.js';

function captureStream() {
  const logs: string[] = [];
  return {
    logs,
    stream: {
      write: (log: string) => {
        logs.push(log);
      },
    },
  };
}

describe('main', () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tally-main-'));
    env = { TALLY_DB_PATH: join(dir, 'ledger.db'), TALLY_PLOTTER: 'none', LOG_LEVEL: 'silent' };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const run = (argv: string[], terminal = createRecordingTerminal()) =>
    main(argv, { env, terminal, clock: () => TEST_TODAY, logDestination: captureStream().stream });

  it('should print usage for --help without reading configuration', async () => {
    const terminal = createRecordingTerminal();
    env = { TALLY_PLOTTER: 'svg' };

    const code = await run(['--help'], terminal);

    expect(code).toBe(EXIT_OK);
    expect(terminal.out).toEqual([USAGE]);
  });

  it('should reject invalid configuration', async () => {
    const terminal = createRecordingTerminal();
    env = { ...env, TALLY_PLOTTER: 'svg' };

    const code = await run(['list'], terminal);

    expect(code).toBe(EXIT_USAGE);
    expect(terminal.err).toHaveLength(1);
    expect(terminal.err[0]).toMatch(/^Invalid configuration: TALLY_PLOTTER: /);
  });

  it('should fail when the database cannot be opened', async () => {
    const terminal = createRecordingTerminal();
    const path = join(dir, 'missing', 'ledger.db');
    env = { ...env, TALLY_DB_PATH: path };

    const code = await run(['list'], terminal);

    expect(code).toBe(EXIT_FAILURE);
    expect(terminal.err).toEqual([`Cannot open ledger database at ${path}`]);
  });

  it('should keep transactions between runs', async () => {
    expect(await run(['add', '-t', 'income', '-a', '1000', '-c', 'salary', '-d', '2024-01-05'])).toBe(EXIT_OK);
    expect(await run(['add', '-t', 'expense', '-a', '200', '-c', 'food', '-d', '2024-01-10'])).toBe(EXIT_OK);

    const terminal = createRecordingTerminal();
    const code = await run(['summary', '--year', '2024', '--month', '1'], terminal);

    expect(code).toBe(EXIT_OK);
    expect(terminal.out).toEqual(['Summary for 2024-01: Income: 1000.00, Expenses: 200.00, Balance: 800.00']);
  });

  it('should return the usage exit code for an unknown command', async () => {
    const terminal = createRecordingTerminal();

    const code = await run(['frobnicate'], terminal);

    expect(code).toBe(EXIT_USAGE);
    expect(terminal.err[0]).toBe('Unknown command: frobnicate');
  });

  it('should start the interactive menu without a command', async () => {
    const terminal = createRecordingTerminal();
    const prompter = createScriptedPrompter(['add', '', 'income', '50', 'gift', 'from gran', 'list', '', '', '', '', 'quit']);

    const code = await main([], {
      env,
      terminal,
      prompter,
      clock: () => TEST_TODAY,
      logDestination: captureStream().stream,
    });

    expect(code).toBe(EXIT_OK);
    expect(prompter.closed).toBe(true);
    expect(terminal.out).toEqual([
      HELP,
      'Added transaction #1.',
      ' ID Date       Type        Amount Category        Note',
      '-'.repeat(70),
      '  1 2024-01-20 income       50.00 gift            from gran',
    ]);
  });

  it('should draw the trend with the text plotter', async () => {
    env = { ...env, TALLY_PLOTTER: 'text' };
    await run(['add', '-t', 'income', '-a', '10', '-c', 'gift', '-d', '2024-01-02']);

    const terminal = createRecordingTerminal();
    const code = await run(['plot', '--months', '1'], terminal);

    expect(code).toBe(EXIT_OK);
    expect(terminal.out.slice(0, 2)).toEqual(['Monthly Income vs Expense', 'Legend: # income  = expense']);
    expect(terminal.out[3]).toBe(`2024-01 income  ${'#'.repeat(40)} 10.00`);
  });

  it('should log mutations to the configured destination', async () => {
    env = { ...env, LOG_LEVEL: 'info' };
    const { logs, stream } = captureStream();

    await main(['add', '-t', 'income', '-a', '5', '-c', 'gift'], {
      env,
      terminal: createRecordingTerminal(),
      clock: () => TEST_TODAY,
      logDestination: stream,
    });

    const entries = logs.map((line) => JSON.parse(line) as { msg: string; service: string });
    const added = entries.find((entry) => entry.msg === 'Transaction added');
    expect(added?.service).toBe('tally-cli');
  });
});
