import type { SqliteDatabase } from './client.js';

/**
 * The ledger's only table. Created on first open and never migrated.
 */
export const TRANSACTIONS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    type TEXT CHECK(type IN ('income','expense')) NOT NULL,
    amount REAL NOT NULL,
    category TEXT NOT NULL,
    note TEXT
  )
`;

export function ensureSchema(db: SqliteDatabase): void {
  db.exec(TRANSACTIONS_TABLE_SQL);
}

/**
 * Shape of a `transactions` row as better-sqlite3 returns it
 */
export interface TransactionRow {
  id: number;
  date: string;
  type: string;
  amount: number;
  category: string;
  note: string | null;
}
