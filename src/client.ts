/**
 * Main DamClient SDK class
 */

import { ulid } from 'ulid';
import type {
  DamClientConfig,
  ResolvedConfig,
  UploadOneOptions,
  UploadOptions,
} from './types/config.js';
import type {
  BatchDeleteResult,
  DamFile,
  DashboardStats,
  FileListResponse,
  SearchOptions,
  StorageStats,
  TransformOptions,
} from './types/api.js';
import type { BatchReport, UploadItem, UploadOutcome } from './types/batch.js';
import { resolveConfig, resolveRetryPolicy } from './config.js';
import { ApiClient } from './lib/api-client.js';
import { BatchUploadCoordinator } from './lib/coordinator.js';
import { UploadRequestBuilder } from './lib/request-builder.js';
import { AxiosTransport, type Transport } from './lib/transport.js';
import { createLogger, getLogger, type Logger } from './utils/logger.js';

/**
 * Handle for a batch running in the background
 */
export interface BatchHandle {
  batchId: string;
  /** Settles with the report, or rejects on batch-level validation failure */
  done: Promise<BatchReport>;
  /** Stop starting new items and retries; in-flight uploads still finish */
  cancel(): void;
}

/**
 * Upload client for the DAM asset service.
 * Create one per API key; instances hold no global state.
 */
export class DamClient {
  readonly config: ResolvedConfig;
  private api: ApiClient;
  private coordinator: BatchUploadCoordinator;
  private logger: Logger;

  constructor(config: DamClientConfig, logger?: Logger) {
    this.config = resolveConfig(config);
    this.logger = logger ?? (this.config.debug ? createLogger(true) : getLogger());

    const transport: Transport =
      config.transport ?? new AxiosTransport({ timeoutMs: this.config.timeoutMs });

    this.api = new ApiClient({
      apiUrl: this.config.apiUrl,
      apiKey: this.config.apiKey,
      apiKeyId: this.config.apiKeyId,
      userAgent: this.config.userAgent,
      transport,
      timeoutMs: this.config.timeoutMs,
      retryPolicy: this.config.retryPolicy,
      debug: this.config.debug,
      logger: this.logger,
    });

    this.coordinator = new BatchUploadCoordinator({
      transport,
      builder: new UploadRequestBuilder({
        apiUrl: this.config.apiUrl,
        apiKey: this.config.apiKey,
        apiKeyId: this.config.apiKeyId,
        userAgent: this.config.userAgent,
        maxFileSize: this.config.maxFileSize,
        maxMetadataKeyLength: this.config.maxMetadataKeyLength,
      }),
      logger: this.logger,
    });
  }

  /**
   * Upload a batch of files and wait for every outcome
   */
  async uploadBatch(items: UploadItem[], options: UploadOptions = {}): Promise<BatchReport> {
    return this.run(items, options, ulid());
  }

  /**
   * Start a batch without waiting for it
   */
  startBatch(items: UploadItem[], options: UploadOptions = {}): BatchHandle {
    const controller = new AbortController();
    const batchId = ulid();

    const external = options.signal;
    const onExternalAbort = () => controller.abort();
    if (external) {
      if (external.aborted) {
        controller.abort();
      } else {
        external.addEventListener('abort', onExternalAbort, { once: true });
      }
    }

    const done = this.run(items, { ...options, signal: controller.signal }, batchId).finally(() => {
      external?.removeEventListener('abort', onExternalAbort);
    });

    return {
      batchId,
      done,
      cancel: () => controller.abort(),
    };
  }

  /**
   * Upload a single file
   */
  async uploadOne(
    filePath: string,
    metadata: Record<string, string> = {},
    options: UploadOneOptions = {}
  ): Promise<UploadOutcome> {
    const { destinationPath = '/', folderId, originalName, maxRetries, ...batchOptions } = options;

    const report = await this.uploadBatch(
      [{ filePath, destinationPath, metadata, folderId, originalName, maxRetries }],
      { ...batchOptions, concurrencyLimit: 1 }
    );
    return report.outcomes[0];
  }

  private async run(
    items: UploadItem[],
    options: UploadOptions,
    batchId: string
  ): Promise<BatchReport> {
    return this.coordinator.submit(items, {
      batchId,
      concurrencyLimit: options.concurrencyLimit ?? this.config.concurrencyLimit,
      retryPolicy: options.retryPolicy
        ? resolveRetryPolicy(options.retryPolicy, this.config.retryPolicy)
        : this.config.retryPolicy,
      signal: options.signal,
      onProgress: options.onProgress,
      onOutcome: options.onOutcome,
    });
  }

  listFiles(options?: SearchOptions): Promise<FileListResponse> {
    return this.api.listFiles(options);
  }

  getFile(fileId: string): Promise<DamFile> {
    return this.api.getFile(fileId);
  }

  deleteFile(fileId: string): Promise<boolean> {
    return this.api.deleteFile(fileId);
  }

  batchDeleteFiles(fileIds: string[]): Promise<BatchDeleteResult> {
    return this.api.batchDeleteFiles(fileIds);
  }

  getFileUrl(fileId: string, transform?: TransformOptions): string {
    return this.api.getFileUrl(fileId, transform);
  }

  getThumbnailUrl(fileId: string, size?: number): string {
    return this.api.getThumbnailUrl(fileId, size);
  }

  downloadFile(fileId: string, outputPath: string, transform?: TransformOptions): Promise<string> {
    return this.api.downloadFile(fileId, outputPath, transform);
  }

  getDashboardStats(): Promise<DashboardStats> {
    return this.api.getDashboardStats();
  }

  getStorageStats(): Promise<StorageStats> {
    return this.api.getStorageStats();
  }
}
