import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../config/env';
import { DEFAULT_LOG_LEVEL } from '../config/ingest';

export type { Logger };

/**
 * Structured logger using pino
 *
 * - ISO timestamps, level labels instead of numbers
 * - API keys are redacted if they end up in a logged object
 *
 * Modules never import a logger instance; the driver creates one and
 * passes it (or a child) down.
 */
export function createLogger(level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  return pino({
    name: 'transaction-ingest',
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['apiKey', '*.apiKey', 'ORB_API_KEY', '*.ORB_API_KEY'],
      censor: '[REDACTED]',
    },
  });
}
