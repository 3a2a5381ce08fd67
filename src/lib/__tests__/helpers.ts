import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { FileRecord } from '../../types/api.js';
import type { Transport, TransportRequest, TransportResponse } from '../transport.js';

export function fileRecord(overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    id: 'file-1',
    filename: 'a1b2c3.jpg',
    original_name: 'photo.jpg',
    mime_type: 'image/jpeg',
    size: 1024,
    storage_path: 'uploads/a1b2c3.jpg',
    file_url: 'http://localhost:55055/files/a1b2c3.jpg',
    user_id: 'user-1',
    ...overrides,
  };
}

export function jsonResponse(
  statusCode: number,
  body: unknown,
  headers: Record<string, string> = {}
): TransportResponse {
  return {
    statusCode,
    headers: { 'content-type': 'application/json', ...headers },
    body: new TextEncoder().encode(JSON.stringify(body)),
  };
}

export function uploadedResponse(id: string, size: number = 1024): TransportResponse {
  return jsonResponse(201, {
    success: true,
    message: 'File uploaded',
    data: fileRecord({ id, size, file_url: `http://localhost:55055/files/${id}` }),
  });
}

export function formField(request: TransportRequest, name: string): string | undefined {
  if (!(request.body instanceof FormData)) {
    return undefined;
  }
  const value = request.body.get(name);
  return typeof value === 'string' ? value : undefined;
}

export type Handler = (
  request: TransportRequest,
  call: number
) => TransportResponse | Promise<TransportResponse>;

/**
 * In-process transport recording every request and the peak concurrency
 */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private handler: Handler) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    const call = this.requests.length;
    this.requests.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.handler(request, call);
    } finally {
      this.inFlight--;
    }
  }

  /** Requests whose `path` form field matches */
  callsFor(destinationPath: string): TransportRequest[] {
    return this.requests.filter((request) => formField(request, 'path') === destinationPath);
  }
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'dam-upload-test-'));
}

/**
 * Write one file per content string; returns their paths in order
 */
export async function writeFiles(dir: string, contents: string[]): Promise<string[]> {
  return Promise.all(
    contents.map(async (content, index) => {
      const filePath = path.join(dir, `file-${index}.txt`);
      await fs.writeFile(filePath, content);
      return filePath;
    })
  );
}
