import type { Transaction } from '../transactions/transaction-types.js';

export const CSV_COLUMNS = ['id', 'date', 'type', 'amount', 'category', 'note'] as const;

const LINE_END = '\r\n';

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toFields(transaction: Transaction): string[] {
  return [
    String(transaction.id),
    transaction.date,
    transaction.type,
    String(transaction.amount),
    transaction.category,
    transaction.note ?? '',
  ];
}

/**
 * Header plus one CRLF-terminated line per transaction
 */
export function transactionsToCsv(transactions: Transaction[]): string {
  const lines = [CSV_COLUMNS.join(','), ...transactions.map((t) => toFields(t).map(escapeField).join(','))];
  return lines.join(LINE_END) + LINE_END;
}
