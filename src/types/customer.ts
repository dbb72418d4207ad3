/**
 * Customer Types
 *
 * The billing platform is authoritative for customers; we only read them
 * or create missing ones.
 */

export interface Customer {
  /** Platform-assigned identifier */
  id: string;
  /** Identifier from the input file (account_id) */
  external_customer_id: string | null;
  name: string;
  email: string;
}

/** Parameters for creating a customer that does not exist yet */
export interface CreateCustomerParams {
  external_customer_id: string;
  name: string;
  email: string;
  /** Deduplicates retried creation requests */
  idempotency_key: string;
}
