export { openDatabase, isConstraintViolation } from './client.js';
export type { SqliteDatabase } from './client.js';
export { ensureSchema, TRANSACTIONS_TABLE_SQL } from './schema.js';
export type { TransactionRow } from './schema.js';
