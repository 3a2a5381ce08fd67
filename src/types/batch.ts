/**
 * Batch upload types
 */

import type { DamFile } from './api.js';

export interface UploadItem {
  /** Path of the local file to upload */
  filePath: string;

  /** Logical destination path in the asset library */
  destinationPath: string;

  /** String metadata attached to the asset */
  metadata: Record<string, string>;

  /**
   * Per-item retry budget; overrides the batch retry policy when set
   */
  maxRetries?: number;

  /** Target folder ID */
  folderId?: string;

  /** Display name stored by the service (defaults to the file name) */
  originalName?: string;
}

export type BatchRequest = readonly UploadItem[];

export type ErrorKind =
  | 'Validation'
  | 'Auth'
  | 'NotFound'
  | 'RateLimited'
  | 'ServerError'
  | 'Transport'
  | 'Exhausted'
  | 'Cancelled';

export interface UploadSuccess {
  status: 'success';
  /** Position of the item in the batch */
  index: number;
  assetId: string;
  url: string;
  size: number;
  /** Transport calls made for this item */
  attempts: number;
  asset: DamFile;
}

export interface UploadFailure {
  status: 'failure';
  index: number;
  errorKind: ErrorKind;
  message: string;
  attempts: number;
  /** HTTP status of the last response, when there was one */
  statusCode?: number;
}

export type UploadOutcome = UploadSuccess | UploadFailure;

export interface BatchSummary {
  total: number;
  succeeded: number;
  /** Failures other than cancellation */
  failed: number;
  cancelled: number;
}

export interface BatchReport {
  batchId: string;
  /** One outcome per submitted item, in submission order */
  outcomes: UploadOutcome[];
  summary: BatchSummary;
  durationMs: number;
}

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  backoffBaseMs: number;
  backoffMultiplier: number;
  /** Upper bound for any single delay, Retry-After included */
  maxBackoffMs: number;
  retryableStatusCodes: ReadonlySet<number>;
}

export interface BatchProgress {
  filesTotal: number;
  filesCompleted: number;
  filesFailed: number;
  bytesTotal: number;
  bytesUploaded: number;
  percentComplete: number;
  currentFile?: string;
}

export interface SubmitOptions {
  /** Maximum simultaneous transport calls */
  concurrencyLimit: number;

  retryPolicy: RetryPolicy;

  /** Stops new items and retries; in-flight requests still complete */
  signal?: AbortSignal;

  /** Batch ID to report under (generated when omitted) */
  batchId?: string;

  onProgress?: (progress: BatchProgress) => void;

  /** Called as each item reaches its terminal outcome */
  onOutcome?: (outcome: UploadOutcome) => void;
}
