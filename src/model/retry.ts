/**
 * Exponential backoff for completion calls.
 */

import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_ENABLE_JITTER,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRIES,
} from '../config/constants.js';
import { isRetryableCode, mapErrorToCode } from './base.js';
import type { RetryOptions } from './types.js';

export interface WithRetryOptions extends RetryOptions {
  /** Replaced in tests to avoid real waits */
  sleep?: (ms: number) => Promise<void>;
  /** Returns a value in [0, 1) */
  random?: () => number;
  signal?: AbortSignal;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (1-based): base × 2^(attempt−1),
 * capped at maxDelayMs. Jitter scales the delay into [50%, 100%].
 */
export function calculateRetryDelay(
  attempt: number,
  options: Pick<WithRetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'enableJitter' | 'random'> = {}
): number {
  const base = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const max = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const capped = Math.min(base * 2 ** (attempt - 1), max);

  if (!(options.enableJitter ?? DEFAULT_ENABLE_JITTER)) {
    return capped;
  }
  const random = options.random ?? Math.random;
  return Math.floor(capped * (0.5 + random() * 0.5));
}

/**
 * Run `fn`, retrying rate limits, network errors and timeouts.
 * Any other error, or the last error once retries run out, is re-thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: WithRetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const code = mapErrorToCode(error);
      if (!isRetryableCode(code) || attempt >= maxRetries || options.signal?.aborted === true) {
        throw error;
      }

      const retryNumber = attempt + 1;
      const delayMs = calculateRetryDelay(retryNumber, options);
      options.onRetry?.({
        attempt: retryNumber,
        maxRetries,
        delayMs,
        error: code,
        message: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs);
    }
  }
}
