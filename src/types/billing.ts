/**
 * Billing API Types
 *
 * Results and errors returned by the billing gateway, and the operation
 * log kept by the dry-run gateway.
 */

/**
 * Closed set of failures a billing API call can end in.
 * not_found is an expected outcome of a customer lookup.
 */
export type BillingApiError =
  | { kind: 'connectivity'; message: string; cause: unknown }
  | { kind: 'rate_limited'; message: string }
  | { kind: 'not_found'; message: string }
  | { kind: 'status'; status: number; body: unknown }
  | { kind: 'unexpected'; detail: string };

export type BillingApiErrorKind = BillingApiError['kind'];

/** Outcome of a single billing API call */
export type ApiResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: BillingApiError };

/** A single billing API operation, as recorded in dry-run mode */
export interface BillingOperation {
  /** Execution order */
  step: number;
  /** SDK method (e.g. "orb.customers.create") */
  action: string;
  /** The payload that would be sent */
  payload: Record<string, unknown>;
}
