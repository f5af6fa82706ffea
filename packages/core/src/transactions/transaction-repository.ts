/**
 * Transaction Repository
 *
 * Data access for the `transactions` table.
 * Plain SQL over better-sqlite3; validation lives in the service.
 */

import { isConstraintViolation } from '@tally/database';
import type { SqliteDatabase, TransactionRow } from '@tally/database';
import { ConstraintViolationError } from './transaction-errors.js';
import { DEFAULT_LIST_LIMIT, TransactionTypeSchema } from './transaction-types.js';
import type {
  ListTransactionsFilters,
  NewTransactionData,
  Transaction,
  TransactionPatchData,
} from './transaction-types.js';

export class TransactionRepository {
  constructor(private db: SqliteDatabase) {}

  /**
   * Insert a row and return it with its assigned id
   */
  create(data: NewTransactionData): Transaction {
    const result = this.write(() =>
      this.db
        .prepare(
          'INSERT INTO transactions (date, type, amount, category, note) VALUES (?, ?, ?, ?, ?)'
        )
        .run(data.date, data.type, data.amount, data.category, data.note)
    );

    return {
      id: Number(result.lastInsertRowid),
      date: data.date,
      type: data.type,
      amount: data.amount,
      category: data.category,
      note: data.note,
    };
  }

  findById(id: number): Transaction | null {
    const row = this.db
      .prepare<[number], TransactionRow>('SELECT * FROM transactions WHERE id = ?')
      .get(id);
    return row ? toTransaction(row) : null;
  }

  /**
   * Rows matching every given filter, newest date first, ties by id descending
   */
  list(filters: ListTransactionsFilters = {}): Transaction[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filters.start) {
      clauses.push('date >= ?');
      params.push(filters.start);
    }
    if (filters.end) {
      clauses.push('date <= ?');
      params.push(filters.end);
    }
    if (filters.category) {
      clauses.push('category = ?');
      params.push(filters.category);
    }
    if (filters.type) {
      clauses.push('type = ?');
      params.push(filters.type);
    }

    let sql = 'SELECT * FROM transactions';
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`;
    }
    sql += ' ORDER BY date DESC, id DESC';

    const limit = filters.limit === undefined ? DEFAULT_LIST_LIMIT : filters.limit;
    if (limit !== null) {
      sql += ' LIMIT ?';
      params.push(limit);
    }

    return this.db.prepare<Array<string | number>, TransactionRow>(sql).all(...params).map(toTransaction);
  }

  /**
   * Write only the fields present in `data`
   *
   * @returns number of rows changed (0 when the id does not exist)
   */
  update(id: number, data: TransactionPatchData): number {
    const fields: string[] = [];
    const values: Array<string | number | null> = [];

    if (data.date !== undefined) {
      fields.push('date = ?');
      values.push(data.date);
    }
    if (data.type !== undefined) {
      fields.push('type = ?');
      values.push(data.type);
    }
    if (data.amount !== undefined) {
      fields.push('amount = ?');
      values.push(data.amount);
    }
    if (data.category !== undefined) {
      fields.push('category = ?');
      values.push(data.category);
    }
    if (data.note !== undefined) {
      fields.push('note = ?');
      values.push(data.note);
    }

    if (fields.length === 0) return 0;

    values.push(id);
    const result = this.write(() =>
      this.db.prepare(`UPDATE transactions SET ${fields.join(', ')} WHERE id = ?`).run(...values)
    );
    return result.changes;
  }

  /**
   * @returns whether a row was removed
   */
  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM transactions WHERE id = ?').run(id);
    return result.changes > 0;
  }

  private write<T>(statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      if (isConstraintViolation(error)) {
        throw new ConstraintViolationError([error.message], { cause: error });
      }
      throw error;
    }
  }
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    date: row.date,
    type: TransactionTypeSchema.parse(row.type),
    amount: row.amount,
    category: row.category,
    note: row.note,
  };
}
