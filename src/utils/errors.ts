/**
 * Custom error classes for better error handling
 */

import type { ErrorKind } from '../types/batch.js';

/**
 * Base class for every error raised by the SDK.
 * `statusCode` is set when the error was built from an HTTP response.
 */
export class DamError extends Error {
  statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = options?.statusCode;
  }
}

export class ValidationError extends DamError {
  constructor(
    message: string,
    public field?: string,
    statusCode?: number
  ) {
    super(message, { statusCode });
  }
}

export class FileTooLargeError extends ValidationError {
  constructor(
    message: string,
    public size?: number,
    public maxSize?: number,
    statusCode?: number
  ) {
    super(message, 'file', statusCode);
  }
}

export class ConfigurationError extends DamError {
  constructor(message: string, public option?: string) {
    super(message);
  }
}

/**
 * Error response returned by the DAM API
 */
export class ApiError extends DamError {
  declare statusCode: number;

  constructor(
    message: string,
    statusCode: number,
    public details?: unknown
  ) {
    super(message, { statusCode });
  }
}

/** 401 / 403 */
export class AuthError extends ApiError {}

export class NotFoundError extends ApiError {}

export class RateLimitedError extends ApiError {
  constructor(
    message: string,
    statusCode: number,
    details?: unknown,
    public retryAfterMs?: number
  ) {
    super(message, statusCode, details);
  }
}

export class ServerError extends ApiError {
  constructor(
    message: string,
    statusCode: number,
    details?: unknown,
    public retryAfterMs?: number
  ) {
    super(message, statusCode, details);
  }
}

export type TransportFailureKind = 'timeout' | 'connection' | 'aborted';

/**
 * Network-level failure: no usable HTTP response was received
 */
export class TransportError extends DamError {
  constructor(
    message: string,
    public kind: TransportFailureKind,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, options);
  }
}

export class CancelledError extends DamError {}

/**
 * Build the matching error for a non-2xx API response
 */
export function errorFromResponse(
  statusCode: number,
  message: string,
  details?: unknown,
  retryAfterMs?: number
): DamError {
  if (statusCode === 401 || statusCode === 403) {
    return new AuthError(message, statusCode, details);
  }
  if (statusCode === 404) {
    return new NotFoundError(message, statusCode, details);
  }
  if (statusCode === 408) {
    return new TransportError(`Request timeout: ${message}`, 'timeout', { statusCode });
  }
  if (statusCode === 413) {
    return new FileTooLargeError(message, undefined, undefined, statusCode);
  }
  if (statusCode === 429) {
    return new RateLimitedError(message, statusCode, details, retryAfterMs);
  }
  if (statusCode >= 500) {
    return new ServerError(`Server error ${statusCode}: ${message}`, statusCode, details, retryAfterMs);
  }
  if (statusCode >= 400) {
    return new ValidationError(message, undefined, statusCode);
  }
  return new ApiError(`Unexpected status ${statusCode}: ${message}`, statusCode, details);
}

/**
 * Map an error onto the outcome taxonomy used in batch reports
 */
export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof ValidationError || error instanceof ConfigurationError) return 'Validation';
  if (error instanceof AuthError) return 'Auth';
  if (error instanceof NotFoundError) return 'NotFound';
  if (error instanceof RateLimitedError) return 'RateLimited';
  if (error instanceof TransportError) return 'Transport';
  if (error instanceof CancelledError) return 'Cancelled';
  return 'ServerError';
}

/**
 * Determine if an error is retryable.
 * Connection failures and timeouts always are; HTTP errors only when their
 * status is listed. Auth failures never are.
 */
export function isRetryableError(
  error: unknown,
  retryableStatusCodes: ReadonlySet<number>
): boolean {
  if (!(error instanceof DamError) || error instanceof AuthError) {
    return false;
  }
  if (error.statusCode !== undefined) {
    return retryableStatusCodes.has(error.statusCode);
  }
  return error instanceof TransportError && error.kind !== 'aborted';
}

/**
 * Server-provided delay hint carried by an error, if any
 */
export function retryAfterOf(error: unknown): number | undefined {
  if (error instanceof RateLimitedError || error instanceof ServerError) {
    return error.retryAfterMs;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
