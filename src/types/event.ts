/**
 * Usage event schema
 *
 * Each event records one transaction row as a billable occurrence.
 * Properties carry the row fields, with the grouped numerics parsed.
 */

export interface UsageEventProperties {
  transaction_id: string;
  account_type: string;
  bank_id: string;
  standard: number;
  sameday: number;
  month: string;
}

export interface UsageEvent {
  /** Resolved platform customer id */
  customer_id: string;

  /** ISO-8601 UTC time the event was built */
  timestamp: string;

  /** Fresh UUID v4 per event - prevents double-counting on retried delivery */
  idempotency_key: string;

  /** Event type tag (e.g. "payment_transaction") */
  event_name: string;

  properties: UsageEventProperties;
}

/** Batch request wrapper for ingesting events */
export interface BatchEventRequest {
  events: UsageEvent[];
}

/** An event the platform accepted the request for but rejected on validation */
export interface EventValidationFailure {
  idempotency_key: string;
  validation_errors: string[];
}

/** Response for event ingestion */
export interface EventIngestionResponse {
  validation_failed: EventValidationFailure[];
}
