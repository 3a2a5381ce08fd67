/**
 * Retry logic with exponential backoff
 */

import type { RetryPolicy } from '../types/batch.js';
import { CancelledError, isRetryableError, retryAfterOf } from './errors.js';

export const DEFAULT_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  408, 429, 500, 502, 503, 504,
]);

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: 3,
  backoffBaseMs: 500,
  backoffMultiplier: 2,
  maxBackoffMs: 30_000,
  retryableStatusCodes: DEFAULT_RETRYABLE_STATUS_CODES,
});

/**
 * Delay before the retry that follows attempt number `attempt` (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'backoffBaseMs' | 'backoffMultiplier' | 'maxBackoffMs'>,
  retryAfterMs?: number
): number {
  const exponential = policy.backoffBaseMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  const delay = retryAfterMs === undefined ? exponential : Math.max(exponential, retryAfterMs);
  return Math.min(policy.maxBackoffMs, delay);
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Sleep for a given number of milliseconds.
 * Resolves early, without throwing, when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions extends RetryPolicy {
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const policy: RetryOptions = { ...DEFAULT_RETRY_POLICY, ...options };
  const shouldRetry =
    policy.shouldRetry ?? ((error: unknown) => isRetryableError(error, policy.retryableStatusCodes));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt > policy.maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, policy, retryAfterOf(error));
      policy.onRetry?.(error, attempt, delay);
      await sleep(delay, policy.signal);

      if (policy.signal?.aborted) {
        throw new CancelledError('Retry cancelled', { cause: error });
      }
    }
  }
}
