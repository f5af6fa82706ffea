/**
 * Subcommand front end: `tally <command> [flags]`
 *
 * Each handler parses its flags, makes one ledger call and prints the result.
 */

import { parseArgs } from 'node:util';
import { LedgerError, TransactionNotFoundError, toIsoDate } from '@tally/core';
import type { CliContext } from './context.js';
import {
  DELETED,
  NOT_FOUND,
  formatAdded,
  formatBreakdown,
  formatEdit,
  formatExport,
  formatPlot,
  formatSummary,
  formatTransactionTable,
} from './format.js';
import {
  InputError,
  parseAmount,
  parseInteger,
  parseOptionalAmount,
  parseOptionalInteger,
} from './input.js';
import { printLines } from './terminal.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: tally [command] [flags]

Without a command, starts the interactive menu.

Commands:
  add      -t, --type <income|expense> -a, --amount <n> -c, --category <name>
           [-d, --date YYYY-MM-DD] [-n, --note <text>]
  list     [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--type <t>] [--category <c>] [--limit <n>]
  export   [--out <file>] [--start YYYY-MM-DD] [--end YYYY-MM-DD]
  summary  [--year YYYY] [--month 1-12]
  cat      [--year YYYY] [--month 1-12]
  edit     <id> [--date] [--type] [--amount] [--category] [--note]
  delete   <id>
  plot     [--months <n>]
  help`;

type Handler = (args: string[], ctx: CliContext) => Promise<number>;

const PERIOD_OPTIONS = {
  year: { type: 'string' },
  month: { type: 'string' },
} as const;

const FIELD_OPTIONS = {
  date: { type: 'string', short: 'd' },
  type: { type: 'string', short: 't' },
  amount: { type: 'string', short: 'a' },
  category: { type: 'string', short: 'c' },
  note: { type: 'string', short: 'n' },
} as const;

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value.trim() === '') {
    throw new InputError(`--${flag} is required.`);
  }
  return value;
}

function singleId(positionals: string[]): number {
  const [raw, ...extra] = positionals;
  if (raw === undefined || extra.length > 0) {
    throw new InputError('Expected exactly one transaction id.');
  }
  return parseInteger(raw, 'Transaction id');
}

const add: Handler = async (args, { ledger, terminal, clock }) => {
  const { values } = parseArgs({ args, options: FIELD_OPTIONS, strict: true });

  const transaction = await ledger.add({
    date: values.date ?? toIsoDate(clock()),
    type: required(values.type, 'type'),
    amount: parseAmount(required(values.amount, 'amount'), '--amount'),
    category: required(values.category, 'category'),
    note: values.note,
  });

  terminal.print(formatAdded(transaction));
  return EXIT_OK;
};

const list: Handler = async (args, { ledger, terminal }) => {
  const { values } = parseArgs({
    args,
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
      type: { type: 'string' },
      category: { type: 'string' },
      limit: { type: 'string' },
    },
    strict: true,
  });

  const rows = await ledger.list({
    start: values.start,
    end: values.end,
    type: values.type,
    category: values.category,
    limit: parseOptionalInteger(values.limit, '--limit'),
  });

  printLines(terminal, formatTransactionTable(rows));
  return EXIT_OK;
};

const exportCsv: Handler = async (args, { ledger, terminal, config }) => {
  const { values } = parseArgs({
    args,
    options: {
      out: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
    },
    strict: true,
  });

  const outcome = await ledger.exportToCsv(values.out ?? config.exportPath, {
    start: values.start,
    end: values.end,
  });

  terminal.print(formatExport(outcome));
  return EXIT_OK;
};

const summary: Handler = async (args, { ledger, terminal }) => {
  const { values } = parseArgs({ args, options: PERIOD_OPTIONS, strict: true });

  const result = await ledger.monthlySummary(
    parseOptionalInteger(values.year, '--year'),
    parseOptionalInteger(values.month, '--month')
  );

  terminal.print(formatSummary(result));
  return EXIT_OK;
};

const categories: Handler = async (args, { ledger, terminal }) => {
  const { values } = parseArgs({ args, options: PERIOD_OPTIONS, strict: true });

  const breakdown = await ledger.categoryBreakdown(
    parseOptionalInteger(values.year, '--year'),
    parseOptionalInteger(values.month, '--month')
  );

  printLines(terminal, formatBreakdown(breakdown));
  return EXIT_OK;
};

const edit: Handler = async (args, { ledger, terminal }) => {
  const { values, positionals } = parseArgs({
    args,
    options: FIELD_OPTIONS,
    allowPositionals: true,
    strict: true,
  });
  const id = singleId(positionals);

  try {
    const outcome = await ledger.edit(id, {
      date: values.date,
      type: values.type,
      amount: parseOptionalAmount(values.amount, '--amount'),
      category: values.category,
      note: values.note,
    });
    terminal.print(formatEdit(outcome));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof TransactionNotFoundError) {
      terminal.warn(NOT_FOUND);
      return EXIT_FAILURE;
    }
    throw error;
  }
};

const remove: Handler = async (args, { ledger, terminal }) => {
  const { positionals } = parseArgs({ args, options: {}, allowPositionals: true, strict: true });

  await ledger.delete(singleId(positionals));

  terminal.print(DELETED);
  return EXIT_OK;
};

const plot: Handler = async (args, { ledger, terminal }) => {
  const { values } = parseArgs({ args, options: { months: { type: 'string' } }, strict: true });

  const outcome = await ledger.plotMonthly(parseOptionalInteger(values.months, '--months'));

  const message = formatPlot(outcome);
  if (message) terminal.print(message);
  return EXIT_OK;
};

const help: Handler = async (_args, { terminal }) => {
  terminal.print(USAGE);
  return EXIT_OK;
};

const HANDLERS: Record<string, Handler> = {
  add,
  list,
  export: exportCsv,
  summary,
  cat: categories,
  edit,
  delete: remove,
  plot,
  help,
};

function isParseArgsError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

/**
 * Run one subcommand and return the process exit code.
 * Domain errors and bad input are reported, not thrown.
 */
export async function runCommand(command: string, args: string[], ctx: CliContext): Promise<number> {
  const handler = Object.hasOwn(HANDLERS, command) ? HANDLERS[command] : undefined;

  if (!handler) {
    ctx.terminal.warn(`Unknown command: ${command}`);
    ctx.terminal.warn(USAGE);
    return EXIT_USAGE;
  }

  try {
    return await handler(args, ctx);
  } catch (error) {
    if (error instanceof InputError || isParseArgsError(error)) {
      ctx.terminal.warn(error.message);
      return EXIT_USAGE;
    }
    if (error instanceof LedgerError) {
      ctx.terminal.warn(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
