/**
 * Transactions Domain
 *
 * Public exports for transaction storage
 */

// Repository layer
export { TransactionRepository } from './transaction-repository.js';

// Domain types
export {
  TRANSACTION_TYPES,
  DEFAULT_LIST_LIMIT,
  TransactionTypeSchema,
  IsoDateSchema,
  NewTransactionSchema,
  TransactionPatchSchema,
  ListFiltersSchema,
} from './transaction-types.js';
export type {
  Transaction,
  TransactionType,
  NewTransactionInput,
  NewTransactionData,
  TransactionPatch,
  TransactionPatchData,
  ListTransactionsInput,
  ListTransactionsFilters,
} from './transaction-types.js';

// Domain errors
export {
  LedgerError,
  TransactionNotFoundError,
  ConstraintViolationError,
  InvalidPeriodError,
  StorageUnavailableError,
  ExportFailedError,
  PlotterUnavailableError,
} from './transaction-errors.js';
