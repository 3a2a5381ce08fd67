import { describe, expect, it } from 'vitest';
import { getLogger, redactSecrets } from '../logger.js';

describe('redactSecrets', () => {
  it('masks secret-bearing keys at any depth', () => {
    const input = {
      apiKey: 'test-secret',
      request: {
        headers: { Authorization: 'Bearer test-secret', 'X-API-Key-Secret': 'test-secret', Accept: 'application/json' },
      },
      items: [{ keySecret: 'test-secret', name: 'a.txt' }],
      attempts: 2,
    };

    expect(redactSecrets(input)).toEqual({
      apiKey: '[REDACTED]',
      request: {
        headers: { Authorization: '[REDACTED]', 'X-API-Key-Secret': '[REDACTED]', Accept: 'application/json' },
      },
      items: [{ keySecret: '[REDACTED]', name: 'a.txt' }],
      attempts: 2,
    });
  });

  it('leaves the input untouched', () => {
    const input = { apiKey: 'test-secret' };
    redactSecrets(input);
    expect(input.apiKey).toBe('test-secret');
  });

  it('passes primitives through', () => {
    expect(redactSecrets('plain')).toBe('plain');
    expect(redactSecrets(null)).toBeNull();
  });
});

describe('getLogger', () => {
  it('returns the shared instance', () => {
    expect(getLogger()).toBe(getLogger());
  });
});
