/**
 * Interactive menu: `tally>` prompt loop over the same ledger calls as the
 * subcommands. Blank answers mean "default" or "keep current".
 */

import readline from 'readline';
import { DEFAULT_TREND_MONTHS, LedgerError, toIsoDate } from '@tally/core';
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
  blankToUndefined,
  parseAmount,
  parseInteger,
  parseOptionalAmount,
  parseOptionalInteger,
} from './input.js';
import { printLines } from './terminal.js';

export const PROMPT = 'tally> ';

export const HELP = `
Commands:
  add         - add transaction
  list        - list transactions
  edit        - edit by id
  del         - delete by id
  summary     - monthly summary
  cat         - category breakdown
  export      - export CSV
  plot        - plot monthly totals
  help        - show this help
  quit/exit   - exit
`;

/**
 * Source of answers. `null` means the input has ended.
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

/**
 * Prompter over a readable stream. Lines that arrive before they are asked
 * for are queued, so piped input is not lost between questions.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, terminal: false });
  const queued: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const resolve = waiting.shift();
    if (resolve) {
      resolve(line);
    } else {
      queued.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    ask(question) {
      output.write(question);
      const line = queued.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => waiting.push(resolve));
    },
    close() {
      rl.close();
    },
  };
}

type MenuAction = (ctx: CliContext, ask: (question: string) => Promise<string>) => Promise<void>;

const add: MenuAction = async ({ ledger, terminal, clock }, ask) => {
  const today = toIsoDate(clock());
  const date = blankToUndefined(await ask(`Date (YYYY-MM-DD) [${today}]: `)) ?? today;
  const type = (await ask('Type (income/expense): ')).trim();
  const amount = parseAmount(await ask('Amount: '));
  const category = (await ask('Category: ')).trim();
  const note = blankToUndefined(await ask('Note (optional): '));

  const transaction = await ledger.add({ date, type, amount, category, note });
  terminal.print(formatAdded(transaction));
};

const list: MenuAction = async ({ ledger, terminal }, ask) => {
  const start = blankToUndefined(await ask('Start date (YYYY-MM-DD, blank for none): '));
  const end = blankToUndefined(await ask('End date (YYYY-MM-DD, blank for none): '));
  const category = blankToUndefined(await ask('Category (blank for all): '));
  const type = blankToUndefined(await ask('Type (income/expense, blank for all): '));

  printLines(terminal, formatTransactionTable(await ledger.list({ start, end, category, type })));
};

const edit: MenuAction = async ({ ledger, terminal }, ask) => {
  const id = parseInteger(await ask('Transaction id: '), 'Transaction id');
  const current = await ledger.get(id);
  if (!current) {
    terminal.print(NOT_FOUND);
    return;
  }

  terminal.print('Leave blank to keep current.');
  const date = blankToUndefined(await ask(`Date [${current.date}]: `));
  const type = blankToUndefined(await ask(`Type [${current.type}]: `));
  const amount = parseOptionalAmount(await ask(`Amount [${current.amount}]: `));
  const category = blankToUndefined(await ask(`Category [${current.category}]: `));
  const note = blankToUndefined(await ask(`Note [${current.note ?? ''}]: `));

  terminal.print(formatEdit(await ledger.edit(id, { date, type, amount, category, note })));
};

const remove: MenuAction = async ({ ledger, terminal }, ask) => {
  const id = parseInteger(await ask('Transaction id to delete: '), 'Transaction id');
  await ledger.delete(id);
  terminal.print(DELETED);
};

async function askPeriod(ask: (question: string) => Promise<string>) {
  const year = parseOptionalInteger(await ask('Year (YYYY, blank for this year): '), 'Year');
  const month = parseOptionalInteger(await ask('Month (1-12, blank for this month): '), 'Month');
  return { year, month };
}

const summary: MenuAction = async ({ ledger, terminal }, ask) => {
  const { year, month } = await askPeriod(ask);
  terminal.print(formatSummary(await ledger.monthlySummary(year, month)));
};

const categories: MenuAction = async ({ ledger, terminal }, ask) => {
  const { year, month } = await askPeriod(ask);
  printLines(terminal, formatBreakdown(await ledger.categoryBreakdown(year, month)));
};

const exportCsv: MenuAction = async ({ ledger, terminal, config }, ask) => {
  const path = blankToUndefined(await ask(`Filename [${config.exportPath}]: `)) ?? config.exportPath;
  const start = blankToUndefined(await ask('Start (YYYY-MM-DD, blank none): '));
  const end = blankToUndefined(await ask('End (YYYY-MM-DD, blank none): '));

  terminal.print(formatExport(await ledger.exportToCsv(path, { start, end })));
};

const plot: MenuAction = async ({ ledger, terminal }) => {
  const message = formatPlot(await ledger.plotMonthly(DEFAULT_TREND_MONTHS));
  if (message) terminal.print(message);
};

const ACTIONS: Record<string, MenuAction> = {
  add,
  list,
  edit,
  del: remove,
  delete: remove,
  summary,
  cat: categories,
  export: exportCsv,
  plot,
};

/**
 * Run the menu until `quit`, `exit` or end of input
 */
export async function runInteractive(ctx: CliContext, prompter: Prompter): Promise<void> {
  const ask = async (question: string): Promise<string> => {
    const answer = await prompter.ask(question);
    if (answer === null) throw new InputClosedError();
    return answer;
  };

  ctx.terminal.print(HELP);

  try {
    for (;;) {
      const command = (await ask(PROMPT)).trim().toLowerCase();

      if (command === '') continue;
      if (command === 'quit' || command === 'exit') break;
      if (command === 'help') {
        ctx.terminal.print(HELP);
        continue;
      }

      const action = Object.hasOwn(ACTIONS, command) ? ACTIONS[command] : undefined;
      if (!action) {
        ctx.terminal.print("Unknown command. Type 'help' for options.");
        continue;
      }

      try {
        await action(ctx, ask);
      } catch (error) {
        if (error instanceof InputError || error instanceof LedgerError) {
          ctx.terminal.warn(error.message);
          continue;
        }
        throw error;
      }
    }
  } catch (error) {
    if (!(error instanceof InputClosedError)) throw error;
  } finally {
    prompter.close();
  }
}
