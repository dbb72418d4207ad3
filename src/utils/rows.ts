/**
 * Transaction row source
 *
 * Streams the input CSV and yields one TransactionRow per record, in file
 * order. The header row names the columns.
 */

import { createReadStream } from 'fs';
import { parse } from 'csv-parse';
import { Value } from '@sinclair/typebox/value';
import { MalformedRowError } from './errors';
import {
  TRANSACTION_COLUMNS,
  type TransactionRow,
  TransactionRowSchema,
} from '../types/transaction';

/**
 * Check a parsed CSV record and keep only the transaction columns.
 * Throws MalformedRowError if a required column is missing.
 */
export function toTransactionRow(record: unknown, row: number): TransactionRow {
  if (!Value.Check(TransactionRowSchema, record)) {
    const fields = new Map(
      typeof record === 'object' && record !== null ? Object.entries(record) : []
    );
    const missing = TRANSACTION_COLUMNS.filter((column) => typeof fields.get(column) !== 'string');
    throw new MalformedRowError(row, missing);
  }

  return {
    account_id: record.account_id,
    transaction_id: record.transaction_id,
    account_type: record.account_type,
    bank_id: record.bank_id,
    standard: record.standard,
    sameday: record.sameday,
    month: record.month,
  };
}

/**
 * Lazily read transaction rows from a CSV file.
 *
 * Rejects with the underlying fs error if the file cannot be opened.
 */
export async function* readTransactionRows(filePath: string): AsyncGenerator<TransactionRow> {
  const input = createReadStream(filePath, { encoding: 'utf8' });
  const parser = parse({
    columns: true,
    bom: true,
    skip_empty_lines: true,
    // Short records surface as MalformedRowError instead of a parser error
    relax_column_count: true,
  });

  input.on('error', (err) => parser.destroy(err));
  input.pipe(parser);

  let row = 0;
  for await (const record of parser) {
    row += 1;
    yield toTransactionRow(record, row);
  }
}
