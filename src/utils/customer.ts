/**
 * Customer resolution
 *
 * Looks a customer up by external id and creates it when Orb reports it
 * missing. Existing customers are never updated.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from './logger';
import { type BillingGateway, logApiError } from './gateway';
import { FatalIngestionError } from './errors';
import type { Customer } from '../types/customer';

/**
 * Display name for a new customer: "acme_corp" → "Acme Corp"
 */
export function deriveCustomerName(accountId: string): string {
  return accountId
    .replace(/_/g, ' ')
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Placeholder email for a new customer: "acme_corp" → "admin@acme-corp.com"
 */
export function deriveCustomerEmail(accountId: string): string {
  return `admin@${accountId.replace(/_/g, '-')}.com`;
}

/**
 * Find the customer for an account, creating it if it does not exist.
 *
 * Any failure other than not-found on lookup, and any failure on
 * creation, throws FatalIngestionError.
 */
export async function resolveCustomer(
  gateway: BillingGateway,
  accountId: string,
  logger: Logger,
  newKey: () => string = uuidv4
): Promise<Customer> {
  logger.debug({ account_id: accountId }, 'Checking for customer');

  const lookup = await gateway.fetchCustomerByExternalId(accountId);
  if (lookup.ok) {
    logger.debug({ account_id: accountId, customer_id: lookup.value.id }, 'Customer found');
    return lookup.value;
  }

  if (lookup.error.kind !== 'not_found') {
    logApiError(logger, lookup.error, 'Error fetching customer');
    throw new FatalIngestionError('fetch_customer', accountId, lookup.error);
  }

  logger.debug({ account_id: accountId }, 'Customer not found, creating new customer');

  const created = await gateway.createCustomer({
    external_customer_id: accountId,
    name: deriveCustomerName(accountId),
    email: deriveCustomerEmail(accountId),
    idempotency_key: newKey(),
  });

  if (!created.ok) {
    logApiError(logger, created.error, 'Error creating customer');
    throw new FatalIngestionError('create_customer', accountId, created.error);
  }

  logger.debug({ account_id: accountId, customer_id: created.value.id }, 'Customer created');
  return created.value;
}
