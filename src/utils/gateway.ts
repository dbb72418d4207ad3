/**
 * Billing Gateway
 *
 * The only module that talks to the Orb SDK. Every call resolves to an
 * ApiResult; SDK exceptions are classified into BillingApiError variants
 * so callers branch on `error.kind` instead of exception classes.
 */

import type { Agent } from 'http';
import Orb from 'orb-billing';
import type { Logger } from './logger';
import type { ApiResult, BillingApiError } from '../types/billing';
import type { CreateCustomerParams, Customer } from '../types/customer';
import type { BatchEventRequest, EventIngestionResponse } from '../types/event';

export interface BillingGateway {
  /** Resolves to a not_found error when no customer has this external id */
  fetchCustomerByExternalId(externalCustomerId: string): Promise<ApiResult<Customer>>;
  createCustomer(params: CreateCustomerParams): Promise<ApiResult<Customer>>;
  ingestEvents(request: BatchEventRequest): Promise<ApiResult<EventIngestionResponse>>;
  /** Release the underlying client. Called once, at the end of the run */
  close(): Promise<void>;
}

/**
 * Map an exception thrown by the Orb SDK to a BillingApiError.
 *
 * RateLimitError and NotFoundError are APIError subclasses, and
 * APIConnectionError is one too (with no status), so order matters.
 */
export function classifyApiError(err: unknown): BillingApiError {
  if (err instanceof Orb.APIConnectionError) {
    return { kind: 'connectivity', message: err.message, cause: err.cause };
  }
  if (err instanceof Orb.RateLimitError) {
    return { kind: 'rate_limited', message: err.message };
  }
  if (err instanceof Orb.NotFoundError) {
    return { kind: 'not_found', message: err.message };
  }
  if (err instanceof Orb.APIError) {
    return { kind: 'status', status: err.status ?? 0, body: err.error };
  }
  return { kind: 'unexpected', detail: err instanceof Error ? err.message : String(err) };
}

/**
 * One-line description of an API error
 */
export function describeApiError(error: BillingApiError): string {
  switch (error.kind) {
    case 'connectivity':
      return 'The server could not be reached';
    case 'rate_limited':
      return 'A 429 status code was received; rerun the import later';
    case 'not_found':
      return 'A 404 status code was received';
    case 'status':
      return `Another non-200-range status code was received (${error.status})`;
    case 'unexpected':
      return `Unexpected error: ${error.detail}`;
    default: {
      const unhandled: never = error;
      return `Unknown error: ${JSON.stringify(unhandled)}`;
    }
  }
}

/**
 * Log an API error with whatever diagnostics its variant carries
 */
export function logApiError(logger: Logger, error: BillingApiError, context: string): void {
  const description = describeApiError(error);
  switch (error.kind) {
    case 'connectivity':
      logger.error({ cause: String(error.cause ?? error.message) }, `${context}: ${description}`);
      break;
    case 'rate_limited':
    case 'not_found':
      logger.error({ detail: error.message }, `${context}: ${description}`);
      break;
    case 'status':
      logger.error({ status: error.status, response: error.body }, `${context}: ${description}`);
      break;
    case 'unexpected':
      logger.error(`${context}: ${description}`);
      break;
  }
}

async function call<T>(request: () => Promise<T>): Promise<ApiResult<T>> {
  try {
    return { ok: true, value: await request() };
  } catch (err) {
    return { ok: false, error: classifyApiError(err) };
  }
}

function toCustomer(customer: {
  id: string;
  external_customer_id: string | null;
  name: string;
  email: string;
}): Customer {
  return {
    id: customer.id,
    external_customer_id: customer.external_customer_id,
    name: customer.name,
    email: customer.email,
  };
}

/**
 * BillingGateway backed by the orb-billing SDK
 */
export class OrbGateway implements BillingGateway {
  constructor(
    private readonly client: Orb,
    private readonly agent: Agent
  ) {}

  fetchCustomerByExternalId(externalCustomerId: string): Promise<ApiResult<Customer>> {
    return call(async () =>
      toCustomer(await this.client.customers.fetchByExternalId(externalCustomerId))
    );
  }

  createCustomer(params: CreateCustomerParams): Promise<ApiResult<Customer>> {
    return call(async () =>
      toCustomer(
        await this.client.customers.create(
          {
            external_customer_id: params.external_customer_id,
            name: params.name,
            email: params.email,
          },
          { idempotencyKey: params.idempotency_key }
        )
      )
    );
  }

  ingestEvents(request: BatchEventRequest): Promise<ApiResult<EventIngestionResponse>> {
    return call(async () => {
      const response = await this.client.events.ingest({ events: request.events });
      return {
        validation_failed: response.validation_failed.map((failure) => ({
          idempotency_key: failure.idempotency_key,
          validation_errors: failure.validation_errors,
        })),
      };
    });
  }

  async close(): Promise<void> {
    this.agent.destroy();
  }
}
