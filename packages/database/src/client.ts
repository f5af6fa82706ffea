import Database from 'better-sqlite3';
import { ensureSchema } from './schema.js';

export type SqliteDatabase = Database.Database;

/**
 * Open (or create) the ledger database at `path` and make sure the schema exists.
 * `:memory:` gives a private in-memory database.
 */
export function openDatabase(path: string): SqliteDatabase {
  const db = new Database(path);
  try {
    ensureSchema(db);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}

/**
 * True when SQLite rejected a write because of a CHECK / NOT NULL / UNIQUE constraint
 */
export function isConstraintViolation(error: unknown): error is InstanceType<typeof Database.SqliteError> {
  return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT');
}
