/**
 * API client for the DAM file, transform and statistics endpoints
 */

import fs from 'fs/promises';
import type {
  BatchDeleteResult,
  DamFile,
  DashboardStats,
  FileListResponse,
  SearchOptions,
  StorageStats,
  TransformOptions,
} from '../types/api.js';
import type { RetryPolicy } from '../types/batch.js';
import type { HttpMethod, Transport, TransportResponse } from './transport.js';
import { bodyJson } from './transport.js';
import { authHeaders, type Credentials } from './request-builder.js';
import { envelopeData, isRecord, toDamFile, toPagination } from './models.js';
import { isSuccessStatus, responseError } from './responses.js';
import { transformToQuery, validateTransformOptions } from './validation.js';
import { ServerError, ValidationError } from '../utils/errors.js';
import { DEFAULT_RETRY_POLICY, retryWithBackoff } from '../utils/retry.js';
import { getLogger, type Logger } from '../utils/logger.js';

export const ENDPOINTS = {
  filesList: '/api/public/files',
  fileDetail: (id: string) => `/api/public/files/${encodeURIComponent(id)}`,
  transform: (id: string) => `/api/transform/${encodeURIComponent(id)}`,
  thumbnail: (id: string) => `/api/transform/${encodeURIComponent(id)}/thumbnail`,
  statsDashboard: '/api/stats/dashboard',
  statsStorage: '/api/stats/storage',
  bulkDelete: '/api/files/bulk-delete',
} as const;

// Methods that are safe to repeat after a failure
const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'DELETE']);

export interface ApiClientConfig extends Credentials {
  apiUrl: string;
  transport: Transport;
  userAgent: string;
  timeoutMs?: number;
  retryPolicy?: Readonly<RetryPolicy>;
  debug?: boolean;
  logger?: Logger;
}

interface RequestOptions {
  query?: URLSearchParams;
  json?: unknown;
  signal?: AbortSignal;
}

export class ApiClient {
  private apiUrl: string;
  private transport: Transport;
  private headers: Readonly<Record<string, string>>;
  private timeoutMs?: number;
  private retryPolicy: Readonly<RetryPolicy>;
  private debug: boolean;
  private logger: Logger;

  constructor(config: ApiClientConfig) {
    this.apiUrl = config.apiUrl.replace(/\/+$/, '');
    this.transport = config.transport;
    this.headers = Object.freeze(authHeaders(config, config.userAgent));
    this.timeoutMs = config.timeoutMs;
    this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.debug = config.debug ?? false;
    this.logger = config.logger ?? getLogger();
  }

  /**
   * Make an HTTP request, retrying idempotent methods
   */
  private async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<TransportResponse> {
    const send = () => this.send(method, path, options);

    if (!IDEMPOTENT_METHODS.has(method)) {
      return send();
    }

    return retryWithBackoff(send, {
      ...this.retryPolicy,
      signal: options.signal,
      onRetry: (error, attempt, delayMs) => {
        this.logger.debug(`Retrying ${method} ${path} in ${delayMs}ms`, {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
      },
    });
  }

  private async send(
    method: HttpMethod,
    path: string,
    options: RequestOptions
  ): Promise<TransportResponse> {
    const query = options.query?.toString();
    const url = `${this.apiUrl}${path}${query ? `?${query}` : ''}`;

    if (this.debug) {
      this.logger.debug(`HTTP Request: ${method} ${url}`);
    }

    const headers: Record<string, string> = { ...this.headers };
    let body: string | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const response = await this.transport.send({
      method,
      url,
      headers,
      body,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });

    if (this.debug) {
      this.logger.debug(`HTTP Response: ${response.statusCode}`, { url });
    }

    if (!isSuccessStatus(response.statusCode)) {
      throw responseError(response);
    }

    return response;
  }

  private async requestJson(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const response = await this.request(method, path, options);
    return bodyJson(response);
  }

  /**
   * List files with optional filtering and pagination
   */
  async listFiles(options: SearchOptions = {}, signal?: AbortSignal): Promise<FileListResponse> {
    const query = new URLSearchParams();
    if (options.folderId) query.set('folder_id', options.folderId);
    if (options.mimeType) query.set('mime_type', options.mimeType);
    if (options.search) query.set('search', options.search);
    query.set('limit', String(options.limit ?? 50));
    query.set('offset', String(options.offset ?? 0));
    query.set('sort', options.sort ?? 'created_at');
    query.set('order', options.order ?? 'desc');

    const body = await this.requestJson('GET', ENDPOINTS.filesList, { query, signal });
    const data = envelopeData(body);
    if (!Array.isArray(data)) {
      throw new ServerError('File list response did not contain a data array', 200, body);
    }

    const files: DamFile[] = [];
    for (const record of data) {
      const file = toDamFile(record);
      if (file) {
        files.push(file);
      } else {
        this.logger.warn('Skipping malformed file record in list response');
      }
    }

    return {
      files,
      pagination: toPagination(isRecord(body) ? body.pagination : undefined, files.length),
    };
  }

  /**
   * Get details of a specific file
   */
  async getFile(fileId: string, signal?: AbortSignal): Promise<DamFile> {
    requireId(fileId);
    const body = await this.requestJson('GET', ENDPOINTS.fileDetail(fileId), { signal });
    const file = toDamFile(envelopeData(body));
    if (!file) {
      throw new ServerError(`Response for file ${fileId} did not contain a file record`, 200, body);
    }
    return file;
  }

  /**
   * Delete a file; resolves to the service's success flag
   */
  async deleteFile(fileId: string, signal?: AbortSignal): Promise<boolean> {
    requireId(fileId);
    const body = await this.requestJson('DELETE', ENDPOINTS.fileDetail(fileId), { signal });
    return isRecord(body) && body.success === true;
  }

  /**
   * Delete multiple files in one call
   */
  async batchDeleteFiles(fileIds: string[]): Promise<BatchDeleteResult> {
    if (fileIds.length === 0) {
      throw new ValidationError('fileIds cannot be empty', 'fileIds');
    }
    fileIds.forEach(requireId);

    const body = await this.requestJson('POST', ENDPOINTS.bulkDelete, {
      json: { file_ids: fileIds },
    });
    return isRecord(body) ? body : {};
  }

  /**
   * URL for a file, with optional transformations applied by the service
   */
  getFileUrl(fileId: string, transform?: TransformOptions): string {
    requireId(fileId);
    const base = `${this.apiUrl}${ENDPOINTS.transform(fileId)}`;
    if (!transform) {
      return base;
    }
    return `${base}?${transformToQuery(transform).toString()}`;
  }

  getThumbnailUrl(fileId: string, size: number = 200): string {
    requireId(fileId);
    validateTransformOptions({ width: size });
    return `${this.apiUrl}${ENDPOINTS.thumbnail(fileId)}?size=${size}`;
  }

  /**
   * Download a file (optionally transformed) to a local path
   */
  async downloadFile(
    fileId: string,
    outputPath: string,
    transform?: TransformOptions,
    signal?: AbortSignal
  ): Promise<string> {
    requireId(fileId);
    const query = transform ? transformToQuery(transform) : undefined;
    const response = await this.request('GET', ENDPOINTS.transform(fileId), { query, signal });
    await fs.writeFile(outputPath, response.body);
    return outputPath;
  }

  async getDashboardStats(signal?: AbortSignal): Promise<DashboardStats> {
    return this.statsFrom(await this.requestJson('GET', ENDPOINTS.statsDashboard, { signal }));
  }

  async getStorageStats(signal?: AbortSignal): Promise<StorageStats> {
    return this.statsFrom(await this.requestJson('GET', ENDPOINTS.statsStorage, { signal }));
  }

  private statsFrom(body: unknown): Record<string, unknown> {
    const data = envelopeData(body);
    return isRecord(data) ? data : {};
  }
}

function requireId(fileId: string): void {
  if (typeof fileId !== 'string' || fileId.trim().length === 0) {
    throw new ValidationError('File ID cannot be empty', 'fileId');
  }
}
