/**
 * Environment Configuration
 *
 * Reads settings from process.env (optionally populated from a .env file)
 * and validates them against a TypeBox schema.
 */

import dotenv from 'dotenv';
import { Type, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from '../utils/errors';
import { DEFAULT_INPUT_FILE, DEFAULT_LOG_LEVEL } from './ingest';

export const LogLevelSchema = Type.Union([
  Type.Literal('trace'),
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
  Type.Literal('fatal'),
  Type.Literal('silent'),
]);

export type LogLevel = Static<typeof LogLevelSchema>;

const EnvSchema = Type.Object({
  ORB_API_KEY: Type.Optional(Type.String({ minLength: 1 })),
  ORB_BASE_URL: Type.Optional(Type.String({ pattern: '^https?://' })),
  INGEST_FILE: Type.String({ minLength: 1 }),
  LOG_LEVEL: LogLevelSchema,
});

export interface IngestConfig {
  /** Authenticates every Orb API call; only optional for dry runs */
  apiKey: string | undefined;
  baseURL: string | undefined;
  filePath: string;
  logLevel: LogLevel;
}

/** Values given on the command line take precedence over the environment */
export interface ConfigOverrides {
  filePath?: string;
  logLevel?: string;
}

/**
 * Load a .env file from the working directory, if there is one.
 * Variables already set in the environment win.
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Build the run configuration from the environment
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): IngestConfig {
  const raw = {
    ORB_API_KEY: env.ORB_API_KEY || undefined,
    ORB_BASE_URL: env.ORB_BASE_URL || undefined,
    INGEST_FILE: overrides.filePath || env.INGEST_FILE || DEFAULT_INPUT_FILE,
    LOG_LEVEL: overrides.logLevel || env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
  };

  if (!Value.Check(EnvSchema, raw)) {
    const error = Value.Errors(EnvSchema, raw).First();
    const detail = error ? `${error.path.slice(1)}: ${error.message}` : 'unknown error';
    throw new ConfigError(`Invalid configuration (${detail})`);
  }

  return {
    apiKey: raw.ORB_API_KEY,
    baseURL: raw.ORB_BASE_URL,
    filePath: raw.INGEST_FILE,
    logLevel: raw.LOG_LEVEL,
  };
}
