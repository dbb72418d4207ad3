/**
 * Dry-run Billing Gateway
 *
 * Builds the same Orb API payloads as a live run without calling Orb.
 * Every call is recorded as an ordered BillingOperation so a run can be
 * inspected before pointing it at a real account.
 *
 * Behaviour:
 *   fetchCustomerByExternalId → not_found (every row takes the create path)
 *   createCustomer            → customer with id "dry_run_<external id>"
 *   ingestEvents              → accepted, no validation failures
 */

import type { Logger } from './logger';
import type { BillingGateway } from './gateway';
import type { ApiResult, BillingOperation } from '../types/billing';
import type { CreateCustomerParams, Customer } from '../types/customer';
import type { BatchEventRequest, EventIngestionResponse } from '../types/event';

export class DryRunGateway implements BillingGateway {
  readonly operations: BillingOperation[] = [];

  constructor(private readonly logger: Logger) {}

  private record(action: string, payload: Record<string, unknown>): void {
    const operation: BillingOperation = {
      step: this.operations.length + 1,
      action,
      payload,
    };
    this.operations.push(operation);
    this.logger.info({ operation }, 'Dry run: billing API call skipped');
  }

  async fetchCustomerByExternalId(externalCustomerId: string): Promise<ApiResult<Customer>> {
    this.record('orb.customers.fetchByExternalId', { external_customer_id: externalCustomerId });
    return {
      ok: false,
      error: { kind: 'not_found', message: 'Dry run: customers are not looked up' },
    };
  }

  async createCustomer(params: CreateCustomerParams): Promise<ApiResult<Customer>> {
    this.record('orb.customers.create', { ...params });
    return {
      ok: true,
      value: {
        id: `dry_run_${params.external_customer_id}`,
        external_customer_id: params.external_customer_id,
        name: params.name,
        email: params.email,
      },
    };
  }

  async ingestEvents(request: BatchEventRequest): Promise<ApiResult<EventIngestionResponse>> {
    this.record('orb.events.ingest', { events: request.events });
    return { ok: true, value: { validation_failed: [] } };
  }

  async close(): Promise<void> {
    this.logger.debug({ operations: this.operations.length }, 'Dry run complete');
  }
}
