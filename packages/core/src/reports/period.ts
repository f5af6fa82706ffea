import { InvalidPeriodError } from '../transactions/transaction-errors.js';

export interface Period {
  year: number;
  month: number;
}

/**
 * Resolve a (year, month) pair, falling back to the month containing `now`
 * when either half is missing.
 */
export function resolvePeriod(year: number | undefined, month: number | undefined, now: Date): Period {
  if (year === undefined || month === undefined) {
    return { year: now.getFullYear(), month: now.getMonth() + 1 };
  }

  if (!Number.isInteger(year) || year < 0 || year > 9999) {
    throw new InvalidPeriodError(`year must be an integer between 0 and 9999, got ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidPeriodError(`month must be an integer between 1 and 12, got ${month}`);
  }

  return { year, month };
}

/**
 * `YYYY-MM`, the key SQLite's `strftime('%Y-%m', date)` produces
 */
export function formatPeriod({ year, month }: Period): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/**
 * Local calendar date as `YYYY-MM-DD`
 */
export function toIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * First day of a trailing window of `months` months ending at `now`
 * (same day of month, overflow rolls forward like SQLite's date modifiers)
 */
export function trailingWindowStart(now: Date, months: number): string {
  return toIsoDate(new Date(now.getFullYear(), now.getMonth() - months, now.getDate()));
}
