import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config/env';
import { ConfigError } from '../src/utils/errors';

describe('loadConfig', () => {
  it('falls back to the default file and log level', () => {
    expect(loadConfig({ ORB_API_KEY: 'test-secret' })).toEqual({
      apiKey: 'test-secret',
      baseURL: undefined,
      filePath: 'data/transactions.csv',
      logLevel: 'debug',
    });
  });

  it('reads the input file and log level from the environment', () => {
    const config = loadConfig({ INGEST_FILE: 'imports/march.csv', LOG_LEVEL: 'warn' });

    expect(config.filePath).toBe('imports/march.csv');
    expect(config.logLevel).toBe('warn');
  });

  it('lets command line values override the environment', () => {
    const config = loadConfig(
      { INGEST_FILE: 'imports/march.csv', LOG_LEVEL: 'warn' },
      { filePath: 'imports/april.csv', logLevel: 'error' }
    );

    expect(config.filePath).toBe('imports/april.csv');
    expect(config.logLevel).toBe('error');
  });

  it('treats an empty API key as unset', () => {
    expect(loadConfig({ ORB_API_KEY: '' }).apiKey).toBeUndefined();
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({}, { logLevel: 'loud' })).toThrow(ConfigError);
  });

  it('rejects a base URL that is not http(s)', () => {
    expect(() => loadConfig({ ORB_BASE_URL: 'ftp://orb.test' })).toThrow(ConfigError);
  });
});
