import type { BillingGateway } from '../../src/utils/gateway';
import type { ApiResult, BillingApiError } from '../../src/types/billing';
import type { CreateCustomerParams, Customer } from '../../src/types/customer';
import type { BatchEventRequest, EventIngestionResponse, UsageEvent } from '../../src/types/event';

export interface FakeGatewayOptions {
  /** Customers that already exist, keyed by external id */
  customers?: Customer[];
  /** Ids handed out to created customers, in order */
  createdIds?: string[];
  fetchErrors?: Record<string, BillingApiError>;
  createErrors?: Record<string, BillingApiError>;
  /** Keyed by transaction_id */
  ingestErrors?: Record<string, BillingApiError>;
  /** transaction_ids Orb reports as failing validation */
  invalidTransactions?: string[];
}

/**
 * In-memory BillingGateway that records every call
 */
export class FakeGateway implements BillingGateway {
  readonly customers = new Map<string, Customer>();
  readonly fetched: string[] = [];
  readonly created: CreateCustomerParams[] = [];
  readonly submitted: UsageEvent[][] = [];
  closed = false;

  private readonly createdIds: string[];

  constructor(private readonly options: FakeGatewayOptions = {}) {
    for (const customer of options.customers ?? []) {
      this.customers.set(customer.external_customer_id ?? customer.id, customer);
    }
    this.createdIds = [...(options.createdIds ?? [])];
  }

  /** Events from batches that were accepted */
  get ingested(): UsageEvent[] {
    return this.submitted
      .flat()
      .filter((event) => !this.options.ingestErrors?.[event.properties.transaction_id]);
  }

  async fetchCustomerByExternalId(externalCustomerId: string): Promise<ApiResult<Customer>> {
    this.fetched.push(externalCustomerId);
    const error = this.options.fetchErrors?.[externalCustomerId];
    if (error) {
      return { ok: false, error };
    }
    const customer = this.customers.get(externalCustomerId);
    if (!customer) {
      return { ok: false, error: { kind: 'not_found', message: 'Customer not found' } };
    }
    return { ok: true, value: customer };
  }

  async createCustomer(params: CreateCustomerParams): Promise<ApiResult<Customer>> {
    this.created.push(params);
    const error = this.options.createErrors?.[params.external_customer_id];
    if (error) {
      return { ok: false, error };
    }
    const customer: Customer = {
      id: this.createdIds.shift() ?? `cus_${params.external_customer_id}`,
      external_customer_id: params.external_customer_id,
      name: params.name,
      email: params.email,
    };
    this.customers.set(params.external_customer_id, customer);
    return { ok: true, value: customer };
  }

  async ingestEvents(request: BatchEventRequest): Promise<ApiResult<EventIngestionResponse>> {
    this.submitted.push(request.events);
    for (const event of request.events) {
      const error = this.options.ingestErrors?.[event.properties.transaction_id];
      if (error) {
        return { ok: false, error };
      }
    }
    const invalid = new Set(this.options.invalidTransactions ?? []);
    return {
      ok: true,
      value: {
        validation_failed: request.events
          .filter((event) => invalid.has(event.properties.transaction_id))
          .map((event) => ({
            idempotency_key: event.idempotency_key,
            validation_errors: ['Property standard must be positive'],
          })),
      },
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
