/**
 * Transaction Ingestion Runner
 *
 * Per row, strictly in order:
 *
 *   RESOLVE_CUSTOMER → EMIT_EVENT → THROTTLE_DELAY → next row
 *
 * Customer resolution failures end the run. Event ingestion failures are
 * logged against the row and the run moves on.
 */

import type { Logger } from './logger';
import { type BillingGateway, describeApiError } from './gateway';
import { resolveCustomer } from './customer';
import { buildUsageEvent, emitUsageEvent } from './events';
import { FatalIngestionError } from './errors';
import { readTransactionRows } from './rows';
import { type Sleep, sleep as defaultSleep, throttle } from './throttle';
import { ROW_THROTTLE_MS } from '../config/ingest';
import type { IngestSummary } from '../types/ingest';
import type { TransactionRow } from '../types/transaction';

export interface IngestDependencies {
  gateway: BillingGateway;
  logger: Logger;
  sleep?: Sleep;
  throttleMs?: number;
  now?: () => Date;
  newKey?: () => string;
}

export interface RunOptions extends IngestDependencies {
  filePath: string;
}

/**
 * Ingest every row. Resolves with per-row counts once the input is
 * exhausted; rejects on the first fatal error.
 */
export async function ingestTransactions(
  rows: AsyncIterable<TransactionRow>,
  deps: IngestDependencies
): Promise<IngestSummary> {
  const { gateway, logger, now, newKey } = deps;
  const summary: IngestSummary = { processed: 0, ingested: 0, failed: 0 };

  for await (const row of rows) {
    const rowLogger = logger.child({ transaction_id: row.transaction_id });
    rowLogger.debug({ row }, 'Processing row');

    const customer = await resolveCustomer(gateway, row.account_id, rowLogger, newKey);
    const event = buildUsageEvent(customer, row, { now, newKey });
    const result = await emitUsageEvent(gateway, event, rowLogger);

    summary.processed += 1;
    if (result.status === 'ingested') {
      summary.ingested += 1;
    } else {
      summary.failed += 1;
    }

    await throttle(deps.throttleMs ?? ROW_THROTTLE_MS, deps.sleep ?? defaultSleep);
  }

  return summary;
}

/**
 * Run a whole import and return the process exit code.
 *
 * The gateway is closed on every path, including fatal errors.
 *   0 - every row was processed (some events may have failed)
 *   1 - the run stopped early
 */
export async function runIngestion(options: RunOptions): Promise<number> {
  const { gateway, logger, filePath } = options;
  logger.debug({ file: filePath }, 'Starting ingestion');

  try {
    const summary = await ingestTransactions(readTransactionRows(filePath), options);
    logger.info(summary, 'Finished ingesting events');
    return 0;
  } catch (err) {
    if (err instanceof FatalIngestionError) {
      logger.error(
        { stage: err.stage, account_id: err.accountId, reason: describeApiError(err.apiError) },
        'Customer could not be resolved, exiting'
      );
    } else {
      logger.error({ err }, 'Ingestion aborted, exiting');
    }
    return 1;
  } finally {
    logger.debug('Closing billing client');
    await gateway.close();
  }
}
