/**
 * Ledger Domain Errors
 *
 * Thrown by the store; front ends print the message and carry on.
 */

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransactionNotFoundError extends LedgerError {
  readonly transactionId: number;

  constructor(id: number) {
    super(`Transaction not found: ${id}`);
    this.transactionId = id;
  }
}

export class ConstraintViolationError extends LedgerError {
  readonly issues: string[];

  constructor(issues: string[], options?: ErrorOptions) {
    super(`Constraint violation: ${issues.join(', ')}`, options);
    this.issues = issues;
  }
}

export class InvalidPeriodError extends LedgerError {
  constructor(message: string) {
    super(`Invalid period: ${message}`);
  }
}

export class StorageUnavailableError extends LedgerError {
  constructor(path: string, options?: ErrorOptions) {
    super(`Cannot open ledger database at ${path}`, options);
  }
}

export class ExportFailedError extends LedgerError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Cannot write export file ${path}`, options);
    this.path = path;
  }
}

export class PlotterUnavailableError extends LedgerError {
  constructor(message = 'Plotting is not available') {
    super(message);
  }
}
