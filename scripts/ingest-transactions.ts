#!/usr/bin/env node
/**
 * Ingest Transactions
 *
 * Reads a CSV of transactions and records each one as a usage event in
 * Orb, creating customers that do not exist yet.
 *
 * Usage: npm run ingest -- [--file <path>] [--dry-run] [--log-level <level>]
 * Example: npm run ingest -- --file data/transactions.csv --dry-run
 *
 * Requires ORB_API_KEY (environment or .env) unless --dry-run is given.
 */

import { Command } from 'commander';
import { loadConfig, loadEnvFile } from '../src/config/env';
import { createOrbGateway } from '../src/config/orb';
import { createLogger } from '../src/utils/logger';
import { DryRunGateway } from '../src/utils/dry-run';
import { runIngestion } from '../src/utils/ingest';

interface CliOptions {
  file?: string;
  dryRun: boolean;
  logLevel?: string;
}

const program = new Command()
  .name('ingest-transactions')
  .description('Ingest a CSV of transactions into Orb as usage events')
  .option('-f, --file <path>', 'CSV file to ingest (default: INGEST_FILE or data/transactions.csv)')
  .option('--dry-run', 'build the API payloads without calling Orb', false)
  .option('--log-level <level>', 'trace, debug, info, warn, error, fatal or silent');

async function main(): Promise<number> {
  program.parse();
  const options = program.opts<CliOptions>();

  loadEnvFile();
  const config = loadConfig(process.env, {
    filePath: options.file,
    logLevel: options.logLevel,
  });

  const logger = createLogger(config.logLevel);
  const gateway = options.dryRun ? new DryRunGateway(logger) : createOrbGateway(config);

  return runIngestion({ filePath: config.filePath, gateway, logger });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
