/**
 * Ingestion Configuration
 */

/** Event name every transaction row is recorded under */
export const EVENT_NAME = 'payment_transaction';

/** Pause after each row (ms) to stay under the billing API's rate limit */
export const ROW_THROTTLE_MS = 1500;

/** Input file used when neither --file nor INGEST_FILE is given */
export const DEFAULT_INPUT_FILE = 'data/transactions.csv';

/** Default log level; the run logs every row at debug */
export const DEFAULT_LOG_LEVEL = 'debug';
