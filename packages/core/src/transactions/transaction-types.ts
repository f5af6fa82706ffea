/**
 * Transaction Domain Types
 *
 * Zod schemas validate what front ends hand to the ledger; the inferred
 * output types are what the repository writes.
 */

import { z } from 'zod';

export const TRANSACTION_TYPES = ['income', 'expense'] as const;

export const TransactionTypeSchema = z.enum(TRANSACTION_TYPES);

export type TransactionType = z.infer<typeof TransactionTypeSchema>;

/**
 * `YYYY-MM-DD`; only the shape is checked, not the calendar
 */
export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

const AmountSchema = z.number().finite().nonnegative();

// Front ends pass whatever the user typed; lower-casing happens here.
const TypeInputSchema = z.string().trim().toLowerCase().pipe(TransactionTypeSchema);

const NoteSchema = z
  .string()
  .nullish()
  .transform((note) => (note ? note : null));

export const NewTransactionSchema = z.object({
  date: IsoDateSchema,
  type: TypeInputSchema,
  amount: AmountSchema,
  category: z.string().min(1, 'Category is required'),
  note: NoteSchema,
});

export type NewTransactionInput = z.input<typeof NewTransactionSchema>;
export type NewTransactionData = z.output<typeof NewTransactionSchema>;

/**
 * Sparse update: every key left `undefined` keeps its stored value
 */
export const TransactionPatchSchema = z.object({
  date: IsoDateSchema.optional(),
  type: TypeInputSchema.optional(),
  amount: AmountSchema.optional(),
  category: z.string().min(1, 'Category is required').optional(),
  note: z
    .string()
    .nullable()
    .optional()
    .transform((note) => (note === undefined ? undefined : note ? note : null)),
});

export type TransactionPatch = z.input<typeof TransactionPatchSchema>;
export type TransactionPatchData = z.output<typeof TransactionPatchSchema>;

export interface Transaction {
  id: number;
  date: string;
  type: TransactionType;
  amount: number;
  category: string;
  note: string | null;
}

export const ListFiltersSchema = z.object({
  /** Inclusive lower bound */
  start: IsoDateSchema.optional(),
  /** Inclusive upper bound */
  end: IsoDateSchema.optional(),
  category: z.string().optional(),
  type: TypeInputSchema.optional(),
  /** Row cap; `null` lifts it */
  limit: z.number().int().safe().nonnegative().nullable().optional(),
});

export type ListTransactionsInput = z.input<typeof ListFiltersSchema>;
export type ListTransactionsFilters = z.output<typeof ListFiltersSchema>;

export const DEFAULT_LIST_LIMIT = 100;
