/**
 * Turning typed text into values the ledger accepts.
 * Front ends share these so both report bad input the same way.
 */

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * Blank (after trimming) means "not given"
 */
export function blankToUndefined(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseInteger(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InputError(`${label} must be a whole number, got "${raw}".`);
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new InputError(`${label} is too large, got "${raw}".`);
  }
  return value;
}

export function parseOptionalInteger(raw: string | undefined, label: string): number | undefined {
  const value = blankToUndefined(raw);
  return value === undefined ? undefined : parseInteger(value, label);
}

export function parseAmount(raw: string, label = 'Amount'): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new InputError(`${label} must be a number, got "${raw}".`);
  }
  return value;
}

export function parseOptionalAmount(raw: string | undefined, label = 'Amount'): number | undefined {
  const value = blankToUndefined(raw);
  return value === undefined ? undefined : parseAmount(value, label);
}
