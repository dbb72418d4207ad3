/**
 * Transaction row schema
 *
 * One record from the input CSV. All values are kept as the raw strings
 * read from the file; numeric columns are parsed when the event is built.
 */

import { Type, Static } from '@sinclair/typebox';

export const TransactionRowSchema = Type.Object({
  /** External customer key */
  account_id: Type.String(),
  transaction_id: Type.String(),
  account_type: Type.String(),
  bank_id: Type.String(),
  /** Comma-grouped integer, possibly empty (e.g. "1,234") */
  standard: Type.String(),
  /** Same format as standard */
  sameday: Type.String(),
  month: Type.String(),
});

export type TransactionRow = Static<typeof TransactionRowSchema>;

/** Column names the input file must carry in its header */
export const TRANSACTION_COLUMNS: readonly string[] = Object.keys(TransactionRowSchema.properties);
