/**
 * HTTP transport boundary
 */

import axios, { type AxiosInstance } from 'axios';
import { TransportError } from '../utils/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: FormData | string;
  /** Overrides the transport's default timeout */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  statusCode: number;
  /** Header names lower-cased */
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * Sends one HTTP request.
 * Resolves for every HTTP status; rejects with TransportError only when no
 * response was received.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface AxiosTransportConfig {
  timeoutMs?: number;
  /** Preconfigured axios instance (adapters, proxies, interceptors) */
  instance?: AxiosInstance;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Transport backed by axios
 */
export class AxiosTransport implements Transport {
  private client: AxiosInstance;
  private timeoutMs: number;

  constructor(config: AxiosTransportConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30000; // 30 seconds
    this.client = config.instance ?? axios.create();
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const timeout = request.timeoutMs ?? this.timeoutMs;

    try {
      const response = await this.client.request<ArrayBuffer>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        timeout,
        signal: request.signal,
        responseType: 'arraybuffer',
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        validateStatus: () => true,
      });

      return {
        statusCode: response.status,
        headers: normalizeHeaders(response.headers),
        body: toBytes(response.data),
      };
    } catch (error) {
      throw toTransportError(error, timeout);
    }
  }
}

function normalizeHeaders(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return result;
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === 'string') return new TextEncoder().encode(data);
  if (data === undefined || data === null) return new Uint8Array(0);
  return new TextEncoder().encode(JSON.stringify(data));
}

function toTransportError(error: unknown, timeout: number): TransportError {
  if (axios.isCancel(error)) {
    return new TransportError('Request aborted', 'aborted', { cause: error });
  }

  if (axios.isAxiosError(error)) {
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return new TransportError(`Request timeout after ${timeout}ms`, 'timeout', { cause: error });
    }
    return new TransportError(`Network request failed: ${error.message}`, 'connection', {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Network request failed: ${message}`, 'connection', { cause: error });
}

/**
 * Decode a response body as UTF-8 text
 */
export function bodyText(response: TransportResponse): string {
  return new TextDecoder().decode(response.body);
}

/**
 * Parse a response body as JSON, or undefined when it is not JSON
 */
export function bodyJson(response: TransportResponse): unknown {
  const text = bodyText(response);
  if (text.trim() === '') {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
