/**
 * Usage event construction and submission
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from './logger';
import { type BillingGateway, logApiError } from './gateway';
import { parseGroupedInt } from './numbers';
import { EVENT_NAME } from '../config/ingest';
import type { Customer } from '../types/customer';
import type { UsageEvent } from '../types/event';
import type { EmitResult } from '../types/ingest';
import type { TransactionRow } from '../types/transaction';

export interface BuildEventOptions {
  now?: () => Date;
  newKey?: () => string;
}

/**
 * Build the usage event for a transaction row.
 *
 * Every call gets a new idempotency key, so a transport-level retry of
 * the same request is deduplicated by Orb but two rows never collide.
 * Throws InvalidFieldError if standard/sameday are not grouped integers.
 */
export function buildUsageEvent(
  customer: Customer,
  row: TransactionRow,
  options: BuildEventOptions = {}
): UsageEvent {
  const now = options.now ?? (() => new Date());
  const newKey = options.newKey ?? uuidv4;

  return {
    customer_id: customer.id,
    timestamp: now().toISOString(),
    idempotency_key: newKey(),
    event_name: EVENT_NAME,
    properties: {
      transaction_id: row.transaction_id,
      account_type: row.account_type,
      bank_id: row.bank_id,
      standard: parseGroupedInt(row.standard, 'standard'),
      sameday: parseGroupedInt(row.sameday, 'sameday'),
      month: row.month,
    },
  };
}

/**
 * Submit a single event. Failures are logged and returned, never thrown:
 * one bad row does not stop the run.
 */
export async function emitUsageEvent(
  gateway: BillingGateway,
  event: UsageEvent,
  logger: Logger
): Promise<EmitResult> {
  const transactionId = event.properties.transaction_id;
  logger.debug({ event }, 'Attempting to ingest event');

  const result = await gateway.ingestEvents({ events: [event] });
  if (!result.ok) {
    logApiError(logger, result.error, 'Error ingesting event');
    logger.error({ transaction_id: transactionId }, 'Failed to ingest event for transaction');
    return { status: 'failed', error: result.error };
  }

  const rejected = result.value.validation_failed.find(
    (failure) => failure.idempotency_key === event.idempotency_key
  );
  if (rejected) {
    logger.error(
      { transaction_id: transactionId, validation_errors: rejected.validation_errors },
      'Event failed validation'
    );
    return {
      status: 'failed',
      error: { kind: 'validation_failed', errors: rejected.validation_errors },
    };
  }

  logger.debug(
    { transaction_id: transactionId, response: result.value },
    'Successfully ingested event for transaction'
  );
  return { status: 'ingested', response: result.value };
}
