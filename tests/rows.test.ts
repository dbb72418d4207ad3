import { describe, it, expect } from 'vitest';
import path from 'path';
import { readTransactionRows, toTransactionRow } from '../src/utils/rows';
import { MalformedRowError } from '../src/utils/errors';
import type { TransactionRow } from '../src/types/transaction';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

async function collect(rows: AsyncIterable<TransactionRow>): Promise<TransactionRow[]> {
  const result: TransactionRow[] = [];
  for await (const row of rows) {
    result.push(row);
  }
  return result;
}

describe('readTransactionRows', () => {
  it('yields rows in file order with raw string values', async () => {
    const rows = await collect(readTransactionRows(fixture('transactions.csv')));

    expect(rows).toEqual([
      {
        account_id: 'acme_corp',
        transaction_id: 'T1',
        account_type: 'checking',
        bank_id: 'bank_01',
        standard: '1,000',
        sameday: '',
        month: '2024-01',
      },
      {
        account_id: 'globex_inc',
        transaction_id: 'T2',
        account_type: 'savings',
        bank_id: 'bank_02',
        standard: '250',
        sameday: '12,500',
        month: '2024-01',
      },
      {
        account_id: 'acme_corp',
        transaction_id: 'T3',
        account_type: 'checking',
        bank_id: 'bank_01',
        standard: '3,125',
        sameday: '40',
        month: '2024-02',
      },
    ]);
  });

  it('drops extra columns and skips blank lines', async () => {
    const rows = await collect(readTransactionRows(fixture('extra-columns.csv')));

    expect(rows).toEqual([
      {
        account_id: 'globex_inc',
        transaction_id: 'T9',
        account_type: 'savings',
        bank_id: 'bank_02',
        standard: '2,000,000',
        sameday: '7',
        month: '2024-03',
      },
    ]);
  });

  it('rejects a file missing a required column', async () => {
    const attempt = collect(readTransactionRows(fixture('missing-column.csv')));

    await expect(attempt).rejects.toBeInstanceOf(MalformedRowError);
    await expect(attempt).rejects.toMatchObject({ row: 1, missing: ['bank_id'] });
  });

  it('rejects when the file cannot be opened', async () => {
    await expect(collect(readTransactionRows(fixture('does-not-exist.csv')))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});

describe('toTransactionRow', () => {
  it('reports every column for a non-object record', () => {
    expect(() => toTransactionRow(null, 3)).toThrow(
      'Row 3 is missing column(s): account_id, transaction_id, account_type, bank_id, standard, sameday, month'
    );
  });
});
