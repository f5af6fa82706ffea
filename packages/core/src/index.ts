/**
 * @tally/core - Domain logic for the Tally ledger
 *
 * Transactions storage, monthly reports and the ledger store service that
 * front ends call into.
 */

export * from './transactions/index.js';
export * from './reports/index.js';
export * from './ledger/index.js';
