/**
 * SDK Configuration Types
 */

import type { RetryPolicy, BatchProgress, UploadOutcome } from './batch.js';
import type { Transport } from '../lib/transport.js';

/**
 * Configuration for the DamClient SDK
 */
export interface DamClientConfig {
  /**
   * Base URL of the DAM API
   * @default 'http://localhost:55055'
   */
  apiUrl?: string;

  /**
   * API key (sent as a bearer token, or as the key secret when `apiKeyId` is set)
   */
  apiKey: string;

  /**
   * API key ID for services issuing ID/secret pairs
   */
  apiKeyId?: string;

  /**
   * Per-request timeout in milliseconds
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * Number of files to upload in parallel
   * @default 4
   */
  concurrencyLimit?: number;

  /**
   * Retry policy overrides
   */
  retryPolicy?: Partial<RetryPolicy>;

  /**
   * Largest accepted file in bytes
   * @default 104857600 (100 MB)
   */
  maxFileSize?: number;

  /**
   * Longest accepted metadata key
   * @default 128
   */
  maxMetadataKeyLength?: number;

  userAgent?: string;

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;

  /**
   * Transport override (defaults to an axios-based transport)
   */
  transport?: Transport;
}

/**
 * Fully resolved configuration, every option present
 */
export interface ResolvedConfig {
  readonly apiUrl: string;
  readonly apiKey: string;
  readonly apiKeyId?: string;
  readonly timeoutMs: number;
  readonly concurrencyLimit: number;
  readonly retryPolicy: Readonly<RetryPolicy>;
  readonly maxFileSize: number;
  readonly maxMetadataKeyLength: number;
  readonly userAgent: string;
  readonly debug: boolean;
}

/**
 * Options for batch upload operation
 */
export interface UploadOptions {
  /**
   * Overrides the client's concurrency limit for this batch
   */
  concurrencyLimit?: number;

  /**
   * Retry policy overrides for this batch
   */
  retryPolicy?: Partial<RetryPolicy>;

  /**
   * Cancellation signal
   */
  signal?: AbortSignal;

  onProgress?: (progress: BatchProgress) => void;

  onOutcome?: (outcome: UploadOutcome) => void;
}

/**
 * Options for a single-file upload
 */
export interface UploadOneOptions extends UploadOptions {
  /** @default '/' */
  destinationPath?: string;
  folderId?: string;
  originalName?: string;
  maxRetries?: number;
}
