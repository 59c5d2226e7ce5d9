import type { StructuredLogger } from '../kernel/contracts.js';
import { TransportError } from '../errors.js';
import { sleep as defaultSleep } from '../utils/async-channel.js';

const BASE_BACKOFF_MS = 1_000;

export interface TransportRetryOptions {
  maxRetries: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: StructuredLogger;
}

/**
 * Runs a transport call, waiting out `too_many_requests` failures. Uses the
 * server's retry-after hint when present, otherwise exponential backoff.
 */
export async function withTransportRetry<T>(fn: () => Promise<T>, options: TransportRetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof TransportError) || error.kind !== 'too_many_requests' || attempt >= options.maxRetries) {
        throw error;
      }
      const delayMs = error.retryAfterMs ?? BASE_BACKOFF_MS * 2 ** attempt;
      options.logger?.warn('Transport rate limited; retrying', { attempt: attempt + 1, delayMs });
      await sleep(delayMs);
    }
  }
}
