import { describe, expect, it } from 'vitest';
import {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  parseRetryAfter,
  retryWithBackoff,
  sleep,
} from '../retry.js';
import { AuthError, CancelledError, ServerError } from '../errors.js';

describe('computeBackoffDelay', () => {
  const policy = { backoffBaseMs: 500, backoffMultiplier: 2, maxBackoffMs: 30000 };

  it('grows exponentially from the base delay', () => {
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt, policy))).toEqual([
      500, 1000, 2000, 4000,
    ]);
  });

  it('caps the delay', () => {
    expect(computeBackoffDelay(10, policy)).toBe(30000);
  });

  it('waits at least the retry-after hint', () => {
    expect(computeBackoffDelay(1, policy, 5000)).toBe(5000);
    expect(computeBackoffDelay(3, policy, 100)).toBe(2000);
  });

  it('caps the retry-after hint as well', () => {
    expect(computeBackoffDelay(1, policy, 60000)).toBe(30000);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('5')).toBe(5000);
    expect(parseRetryAfter(' 0 ')).toBe(0);
  });

  it('reads an HTTP date relative to now', () => {
    const date = 'Wed, 21 Oct 2015 07:28:00 GMT';
    const now = Date.parse(date) - 3000;
    expect(parseRetryAfter(date, now)).toBe(3000);
  });

  it('never returns a negative delay for past dates', () => {
    const date = 'Wed, 21 Oct 2015 07:28:00 GMT';
    expect(parseRetryAfter(date, Date.parse(date) + 60000)).toBe(0);
  });

  it('ignores missing and unparseable values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('sleep', () => {
  it('resolves early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('resolves immediately for an already aborted signal', async () => {
    await expect(sleep(10_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});

describe('retryWithBackoff', () => {
  const fast = { backoffBaseMs: 1 };

  it('returns the first successful result', async () => {
    let calls = 0;
    const result = await retryWithBackoff(async () => {
      calls++;
      if (calls < 3) {
        throw new ServerError('Server error 503: busy', 503);
      }
      return 'ok';
    }, fast);

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('rethrows non-retryable errors at once', async () => {
    let calls = 0;
    await expect(
      retryWithBackoff(async () => {
        calls++;
        throw new AuthError('invalid key', 401);
      }, fast)
    ).rejects.toThrow(AuthError);
    expect(calls).toBe(1);
  });

  it('gives up after maxRetries retries', async () => {
    let calls = 0;
    await expect(
      retryWithBackoff(async () => {
        calls++;
        throw new ServerError('Server error 502: bad gateway', 502);
      }, { ...fast, maxRetries: 2 })
    ).rejects.toThrow('Server error 502: bad gateway');
    expect(calls).toBe(3);
  });

  it('reports each retry with its delay', async () => {
    const retries: Array<[number, number]> = [];
    let calls = 0;
    await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new ServerError('Server error 500: boom', 500);
        return calls;
      },
      { ...fast, onRetry: (_error, attempt, delayMs) => retries.push([attempt, delayMs]) }
    );
    expect(retries).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('honours a custom shouldRetry', async () => {
    let calls = 0;
    await expect(
      retryWithBackoff(async () => {
        calls++;
        throw new Error('flaky');
      }, { ...fast, maxRetries: 1, shouldRetry: () => true })
    ).rejects.toThrow('flaky');
    expect(calls).toBe(2);
  });

  it('stops with CancelledError when aborted between attempts', async () => {
    const controller = new AbortController();
    let calls = 0;
    await expect(
      retryWithBackoff(async () => {
        calls++;
        throw new ServerError('Server error 503: busy', 503);
      }, { ...fast, signal: controller.signal, onRetry: () => controller.abort() })
    ).rejects.toThrow(CancelledError);
    expect(calls).toBe(1);
  });

  it('uses the default policy', () => {
    expect(DEFAULT_RETRY_POLICY.maxRetries).toBe(3);
    expect([...DEFAULT_RETRY_POLICY.retryableStatusCodes]).toEqual([408, 429, 500, 502, 503, 504]);
  });
});
