import http from 'http';
import https from 'https';
import Orb from 'orb-billing';
import { OrbGateway } from '../utils/gateway';
import { ConfigError } from '../utils/errors';
import type { IngestConfig } from './env';

/**
 * Create the Orb client for a run.
 *
 * The client gets its own keep-alive agent so that closing the gateway
 * releases every pooled connection.
 */
export function createOrbGateway(config: Pick<IngestConfig, 'apiKey' | 'baseURL'>): OrbGateway {
  if (!config.apiKey) {
    throw new ConfigError('ORB_API_KEY is not set');
  }

  const agent = config.baseURL?.startsWith('http://')
    ? new http.Agent({ keepAlive: true })
    : new https.Agent({ keepAlive: true });

  const client = new Orb({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    httpAgent: agent,
  });

  return new OrbGateway(client, agent);
}
