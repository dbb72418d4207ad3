import { ROW_THROTTLE_MS } from '../config/ingest';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Fixed pause between rows. No backoff: a 429 ends the run instead.
 */
export async function throttle(ms: number = ROW_THROTTLE_MS, wait: Sleep = sleep): Promise<void> {
  await wait(ms);
}
