import type { BillingApiError } from './billing';
import type { EventIngestionResponse } from './event';

/** Per-row result of submitting a usage event */
export type EmitResult =
  | { status: 'ingested'; response: EventIngestionResponse }
  | { status: 'failed'; error: EmitFailure };

export type EmitFailure =
  | BillingApiError
  | { kind: 'validation_failed'; errors: string[] };

/** Counts for a completed run */
export interface IngestSummary {
  processed: number;
  ingested: number;
  failed: number;
}
