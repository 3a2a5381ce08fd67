/**
 * Batch upload coordination - bounded worker pool with per-item retries
 */

import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import { ulid } from 'ulid';
import type {
  BatchProgress,
  BatchReport,
  BatchRequest,
  ErrorKind,
  RetryPolicy,
  SubmitOptions,
  UploadFailure,
  UploadItem,
  UploadOutcome,
} from '../types/batch.js';
import type { Transport, TransportRequest } from './transport.js';
import { bodyJson } from './transport.js';
import { ResultAggregator } from './aggregator.js';
import { envelopeData, toDamFile } from './models.js';
import { isSuccessStatus, responseError } from './responses.js';
import {
  DamError,
  TransportError,
  ValidationError,
  errorKindOf,
  errorMessage,
  isRetryableError,
  retryAfterOf,
} from '../utils/errors.js';
import { computeBackoffDelay, sleep } from '../utils/retry.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * Turns an upload item into a transport request
 */
export interface RequestBuilder {
  build(item: UploadItem): Promise<TransportRequest>;
}

export interface CoordinatorDeps {
  transport: Transport;
  builder: RequestBuilder;
  logger?: Logger;
  /** Backoff wait; must resolve early when the signal aborts */
  delay?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface PreparedItem {
  item: Readonly<UploadItem>;
  size: number;
}

export class BatchUploadCoordinator {
  private transport: Transport;
  private builder: RequestBuilder;
  private logger: Logger;
  private delay: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(deps: CoordinatorDeps) {
    this.transport = deps.transport;
    this.builder = deps.builder;
    this.logger = deps.logger ?? getLogger();
    this.delay = deps.delay ?? sleep;
  }

  /**
   * Upload every item and report one outcome per item, in input order.
   * Rejects only for batch-level precondition failures, before any request is sent.
   */
  async submit(request: BatchRequest, options: SubmitOptions): Promise<BatchReport> {
    const startTime = Date.now();
    const { concurrencyLimit, retryPolicy, signal } = options;

    if (request.length === 0) {
      throw new ValidationError('Batch must contain at least one item', 'items');
    }
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new ValidationError('concurrencyLimit must be an integer >= 1', 'concurrencyLimit');
    }
    for (const [index, item] of request.entries()) {
      if (item.maxRetries !== undefined && (!Number.isInteger(item.maxRetries) || item.maxRetries < 0)) {
        throw new ValidationError(`Item ${index}: maxRetries must be an integer >= 0`, 'maxRetries');
      }
    }

    const prepared = await this.prepare(request);
    const batchId = options.batchId ?? ulid();
    const aggregator = new ResultAggregator(batchId, prepared.length);
    const policy = Object.freeze({ ...retryPolicy });

    const bytesTotal = prepared.reduce((sum, p) => sum + p.size, 0);
    const progress: BatchProgress = {
      filesTotal: prepared.length,
      filesCompleted: 0,
      filesFailed: 0,
      bytesTotal,
      bytesUploaded: 0,
      percentComplete: 0,
    };

    this.logger.info(`Starting batch ${batchId}`, {
      files: prepared.length,
      bytes: bytesTotal,
      concurrency: concurrencyLimit,
    });

    const finish = (outcome: UploadOutcome) => {
      aggregator.record(outcome);

      const { item, size } = prepared[outcome.index];
      if (outcome.status === 'success') {
        progress.filesCompleted++;
        progress.bytesUploaded += size;
      } else {
        progress.filesFailed++;
        if (outcome.errorKind !== 'Cancelled') {
          this.logger.warn(`Failed to upload ${item.filePath}`, {
            batchId,
            index: outcome.index,
            errorKind: outcome.errorKind,
            error: outcome.message,
            attempts: outcome.attempts,
          });
        }
      }
      progress.currentFile = item.filePath;
      progress.percentComplete = percentOf(progress);

      this.notify(() => options.onOutcome?.(outcome), 'onOutcome');
      this.notify(() => options.onProgress?.({ ...progress }), 'onProgress');
    };

    // Pending item indices; shift() is the only shared mutation
    const queue = prepared.map((_, index) => index);

    const worker = async (): Promise<void> => {
      while (queue.length > 0 && !signal?.aborted) {
        const index = queue.shift();
        if (index === undefined) break;

        const outcome = await this.uploadItem(index, prepared[index].item, policy, signal);
        finish(outcome);
      }
    };

    const workerCount = Math.min(concurrencyLimit, prepared.length);
    const workers: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i++) {
      workers.push(worker());
    }
    await Promise.all(workers);

    // Items never started because the batch was cancelled
    for (const index of queue.splice(0)) {
      finish(failure(index, 'Cancelled', 'Batch cancelled before upload started', 0));
    }

    const report = aggregator.collect(Date.now() - startTime);
    this.logger.info(`Batch ${batchId} finished`, { ...report.summary, durationMs: report.durationMs });
    return report;
  }

  /**
   * Check every file before any network activity
   */
  private async prepare(request: BatchRequest): Promise<PreparedItem[]> {
    const unreadable: string[] = [];

    const prepared = await Promise.all(
      request.map(async (item): Promise<PreparedItem> => {
        const frozen = Object.freeze({ ...item, metadata: Object.freeze({ ...item.metadata }) });
        try {
          const stats = await fs.stat(item.filePath);
          if (!stats.isFile()) {
            unreadable.push(`${item.filePath} (not a regular file)`);
            return { item: frozen, size: 0 };
          }
          await fs.access(item.filePath, fsConstants.R_OK);
          return { item: frozen, size: stats.size };
        } catch (error) {
          unreadable.push(`${item.filePath} (${errorMessage(error)})`);
          return { item: frozen, size: 0 };
        }
      })
    );

    if (unreadable.length > 0) {
      throw new ValidationError(`Cannot read files: ${unreadable.join('; ')}`, 'filePath');
    }

    return prepared;
  }

  /**
   * Run one item to its terminal outcome. Never throws.
   */
  private async uploadItem(
    index: number,
    item: Readonly<UploadItem>,
    policy: Readonly<RetryPolicy>,
    signal?: AbortSignal
  ): Promise<UploadOutcome> {
    const maxRetries = item.maxRetries ?? policy.maxRetries;
    let attempts = 0;

    for (;;) {
      let request: TransportRequest;
      try {
        request = await this.builder.build(item);
      } catch (error) {
        return failure(index, errorKindOf(error), errorMessage(error), attempts);
      }

      attempts++;
      this.logger.debug(`Uploading ${item.filePath}`, { index, attempt: attempts });

      let error: DamError;
      try {
        const response = await this.transport.send(request);

        if (isSuccessStatus(response.statusCode)) {
          const asset = toDamFile(envelopeData(bodyJson(response)));
          if (!asset) {
            return failure(
              index,
              'ServerError',
              'Upload response did not contain a file record',
              attempts,
              response.statusCode
            );
          }
          return {
            status: 'success',
            index,
            assetId: asset.id,
            url: asset.fileUrl,
            size: asset.size,
            attempts,
            asset,
          };
        }

        error = responseError(response);
      } catch (sendError) {
        error =
          sendError instanceof DamError
            ? sendError
            : new TransportError(`Network request failed: ${errorMessage(sendError)}`, 'connection', {
                cause: sendError,
              });
      }

      if (!isRetryableError(error, policy.retryableStatusCodes)) {
        return failure(index, errorKindOf(error), error.message, attempts, error.statusCode);
      }
      if (attempts > maxRetries) {
        return failure(
          index,
          'Exhausted',
          `Gave up after ${attempts} attempts: ${error.message}`,
          attempts,
          error.statusCode
        );
      }
      if (signal?.aborted) {
        return failure(index, 'Cancelled', `Retry cancelled: ${error.message}`, attempts, error.statusCode);
      }

      const delayMs = computeBackoffDelay(attempts, policy, retryAfterOf(error));
      this.logger.debug(`Retrying ${item.filePath} in ${delayMs}ms`, {
        index,
        attempt: attempts,
        error: error.message,
      });
      await this.delay(delayMs, signal);

      if (signal?.aborted) {
        return failure(index, 'Cancelled', `Retry cancelled: ${error.message}`, attempts, error.statusCode);
      }
    }
  }

  /**
   * Caller callbacks must not break the worker loop
   */
  private notify(callback: () => void, name: string): void {
    try {
      callback();
    } catch (error) {
      this.logger.error(`${name} callback threw`, { error: errorMessage(error) });
    }
  }
}

function failure(
  index: number,
  errorKind: ErrorKind,
  message: string,
  attempts: number,
  statusCode?: number
): UploadFailure {
  const outcome: UploadFailure = { status: 'failure', index, errorKind, message, attempts };
  if (statusCode !== undefined) {
    outcome.statusCode = statusCode;
  }
  return outcome;
}

function percentOf(progress: BatchProgress): number {
  const done = progress.filesCompleted + progress.filesFailed;
  if (progress.bytesTotal > 0 && progress.filesFailed === 0) {
    return Math.round((progress.bytesUploaded / progress.bytesTotal) * 100);
  }
  return Math.round((done / progress.filesTotal) * 100);
}
