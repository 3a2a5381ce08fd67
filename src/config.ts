/**
 * Configuration resolution and environment loading
 */

import dotenv from 'dotenv';
import type { DamClientConfig, ResolvedConfig } from './types/config.js';
import type { RetryPolicy } from './types/batch.js';
import { ConfigurationError, ValidationError } from './utils/errors.js';
import { DEFAULT_RETRY_POLICY } from './utils/retry.js';
import { MAX_FILE_SIZE, MAX_METADATA_KEY_LENGTH, validateApiUrl } from './lib/validation.js';

export const SDK_VERSION = '1.0.0';

export const DEFAULT_API_URL = 'http://localhost:55055';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_CONCURRENCY_LIMIT = 4;
export const DEFAULT_USER_AGENT = `dam-upload-client/${SDK_VERSION}`;

const NON_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([401, 403]);

function requireInteger(value: number, option: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${option} must be an integer >= ${min}`, option);
  }
}

/**
 * Merge retry policy overrides onto a base policy and validate the result
 */
export function resolveRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
  base: Readonly<RetryPolicy> = DEFAULT_RETRY_POLICY
): Readonly<RetryPolicy> {
  const policy: RetryPolicy = {
    maxRetries: overrides.maxRetries ?? base.maxRetries,
    backoffBaseMs: overrides.backoffBaseMs ?? base.backoffBaseMs,
    backoffMultiplier: overrides.backoffMultiplier ?? base.backoffMultiplier,
    maxBackoffMs: overrides.maxBackoffMs ?? base.maxBackoffMs,
    retryableStatusCodes: new Set(overrides.retryableStatusCodes ?? base.retryableStatusCodes),
  };

  requireInteger(policy.maxRetries, 'retryPolicy.maxRetries', 0);
  if (!Number.isFinite(policy.backoffBaseMs) || policy.backoffBaseMs < 0) {
    throw new ConfigurationError('retryPolicy.backoffBaseMs must be >= 0', 'retryPolicy.backoffBaseMs');
  }
  if (!Number.isFinite(policy.backoffMultiplier) || policy.backoffMultiplier < 1) {
    throw new ConfigurationError(
      'retryPolicy.backoffMultiplier must be >= 1',
      'retryPolicy.backoffMultiplier'
    );
  }
  if (!Number.isFinite(policy.maxBackoffMs) || policy.maxBackoffMs < 0) {
    throw new ConfigurationError('retryPolicy.maxBackoffMs must be >= 0', 'retryPolicy.maxBackoffMs');
  }
  for (const code of policy.retryableStatusCodes) {
    if (!Number.isInteger(code) || code < 100 || code > 599) {
      throw new ConfigurationError(
        `retryPolicy.retryableStatusCodes contains invalid status ${code}`,
        'retryPolicy.retryableStatusCodes'
      );
    }
    if (NON_RETRYABLE_STATUS_CODES.has(code)) {
      throw new ConfigurationError(
        `retryPolicy.retryableStatusCodes cannot include ${code}: auth failures are never retried`,
        'retryPolicy.retryableStatusCodes'
      );
    }
  }

  return Object.freeze(policy);
}

/**
 * Apply defaults to every option and freeze the result
 */
export function resolveConfig(config: Omit<DamClientConfig, 'transport'>): ResolvedConfig {
  if (typeof config.apiKey !== 'string' || config.apiKey.trim().length === 0) {
    throw new ConfigurationError('apiKey is required', 'apiKey');
  }

  const apiUrl = (config.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
  try {
    validateApiUrl(apiUrl);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(error.message, 'apiUrl');
    }
    throw error;
  }

  const resolved: ResolvedConfig = {
    apiUrl,
    apiKey: config.apiKey,
    apiKeyId: config.apiKeyId,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    concurrencyLimit: config.concurrencyLimit ?? DEFAULT_CONCURRENCY_LIMIT,
    retryPolicy: resolveRetryPolicy(config.retryPolicy),
    maxFileSize: config.maxFileSize ?? MAX_FILE_SIZE,
    maxMetadataKeyLength: config.maxMetadataKeyLength ?? MAX_METADATA_KEY_LENGTH,
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    debug: config.debug ?? false,
  };

  requireInteger(resolved.timeoutMs, 'timeoutMs', 1);
  requireInteger(resolved.concurrencyLimit, 'concurrencyLimit', 1);
  requireInteger(resolved.maxFileSize, 'maxFileSize', 1);
  requireInteger(resolved.maxMetadataKeyLength, 'maxMetadataKeyLength', 1);

  return Object.freeze(resolved);
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`, name);
  }
  return value;
}

/**
 * Read client configuration from the environment (and a .env file, when present)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DamClientConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const apiKey = env.DAM_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError('DAM_API_KEY is not set', 'apiKey');
  }

  const maxRetries = parseIntegerEnv(env, 'DAM_MAX_RETRIES');

  return {
    apiKey,
    apiUrl: env.DAM_API_URL || undefined,
    apiKeyId: env.DAM_API_KEY_ID || undefined,
    timeoutMs: parseIntegerEnv(env, 'DAM_TIMEOUT_MS'),
    concurrencyLimit: parseIntegerEnv(env, 'DAM_CONCURRENCY'),
    retryPolicy: maxRetries === undefined ? undefined : { maxRetries },
    debug: env.DAM_DEBUG === 'true' || env.DAM_DEBUG === '1',
  };
}
