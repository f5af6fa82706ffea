import { openDatabase } from '@tally/database';
import { silentLogger } from '@tally/observability';
import { TransactionRepository } from '../transactions/transaction-repository.js';
import { StorageUnavailableError } from '../transactions/transaction-errors.js';
import { ReportRepository } from '../reports/report-repository.js';
import { LedgerService } from './ledger-service.js';
import type { LedgerOptions } from './ledger-types.js';

/**
 * Open the database at `options.databasePath` and wire the ledger store.
 * Call `close()` on the result when done.
 *
 * @throws StorageUnavailableError when the file cannot be opened or created
 */
export function createLedger(options: LedgerOptions): LedgerService {
  const logger = options.logger ?? silentLogger;

  const db = openOrFail(options.databasePath);

  logger.debug({ databasePath: options.databasePath }, 'Ledger database opened');

  return new LedgerService(new TransactionRepository(db), new ReportRepository(db), {
    logger,
    plotter: options.plotter ?? null,
    clock: options.clock ?? (() => new Date()),
    onClose: () => {
      if (db.open) db.close();
    },
  });
}

function openOrFail(path: string) {
  try {
    return openDatabase(path);
  } catch (error) {
    throw new StorageUnavailableError(path, { cause: error });
  }
}
