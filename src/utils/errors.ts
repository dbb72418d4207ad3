import type { BillingApiError } from '../types/billing';

/**
 * Raised when required configuration is missing or invalid
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when a CSV record is missing one of the required columns.
 * Ends the run: rows are not skipped.
 */
export class MalformedRowError extends Error {
  constructor(
    readonly row: number,
    readonly missing: string[]
  ) {
    super(`Row ${row} is missing column(s): ${missing.join(', ')}`);
    this.name = 'MalformedRowError';
  }
}

/**
 * Raised when a numeric column holds something other than a grouped integer
 */
export class InvalidFieldError extends Error {
  constructor(
    readonly field: string,
    readonly value: string
  ) {
    super(`Invalid value for ${field}: "${value}"`);
    this.name = 'InvalidFieldError';
  }
}

/**
 * Raised when a customer cannot be looked up or created.
 * The run stops; the driver closes the client and exits with code 1.
 */
export class FatalIngestionError extends Error {
  constructor(
    readonly stage: 'fetch_customer' | 'create_customer',
    readonly accountId: string,
    readonly apiError: BillingApiError
  ) {
    super(`Failed to ${stage === 'fetch_customer' ? 'fetch' : 'create'} customer ${accountId}: ${apiError.kind}`);
    this.name = 'FatalIngestionError';
  }
}
