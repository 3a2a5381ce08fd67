/**
 * Builds the multipart upload request for one item
 */

import fs from 'fs/promises';
import type { UploadItem } from '../types/batch.js';
import type { TransportRequest } from './transport.js';
import { ValidationError } from '../utils/errors.js';
import { computeChecksum } from '../utils/hash.js';
import {
  MAX_FILE_SIZE,
  MAX_METADATA_KEY_LENGTH,
  getMimeType,
  sanitizeFileName,
  validateDestinationPath,
  validateFileSize,
  validateMetadata,
} from './validation.js';

export const UPLOAD_SINGLE_PATH = '/api/public/single';

export interface Credentials {
  apiKey: string;
  apiKeyId?: string;
}

export interface RequestBuilderConfig extends Credentials {
  apiUrl: string;
  userAgent: string;
  maxFileSize?: number;
  maxMetadataKeyLength?: number;
}

/**
 * Headers sent with every API call
 */
export function authHeaders(credentials: Credentials, userAgent: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': userAgent,
  };

  if (credentials.apiKeyId) {
    headers['X-API-Key-ID'] = credentials.apiKeyId;
    headers['X-API-Key-Secret'] = credentials.apiKey;
  } else {
    headers['Authorization'] = `Bearer ${credentials.apiKey}`;
  }

  return headers;
}

export class UploadRequestBuilder {
  private readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly maxFileSize: number;
  private readonly maxMetadataKeyLength: number;

  constructor(config: RequestBuilderConfig) {
    this.url = `${config.apiUrl.replace(/\/+$/, '')}${UPLOAD_SINGLE_PATH}`;
    this.headers = Object.freeze(authHeaders(config, config.userAgent));
    this.maxFileSize = config.maxFileSize ?? MAX_FILE_SIZE;
    this.maxMetadataKeyLength = config.maxMetadataKeyLength ?? MAX_METADATA_KEY_LENGTH;
  }

  /**
   * Build a fresh request. Bodies are single-use, so call once per attempt.
   */
  async build(item: UploadItem): Promise<TransportRequest> {
    validateDestinationPath(item.destinationPath);
    validateMetadata(item.metadata, this.maxMetadataKeyLength);

    const content = await this.readContent(item.filePath);
    validateFileSize(content.byteLength, this.maxFileSize);

    const fileName = sanitizeFileName(item.filePath);
    const checksum = await computeChecksum(content);

    const form = new FormData();
    form.append('file', new Blob([content], { type: getMimeType(fileName) }), fileName);
    form.append('path', item.destinationPath);
    if (Object.keys(item.metadata).length > 0) {
      form.append('metadata', JSON.stringify(sortKeys(item.metadata)));
    }
    form.append('checksum', checksum);
    if (item.folderId) {
      form.append('folder_id', item.folderId);
    }
    if (item.originalName) {
      form.append('original_name', item.originalName);
    }

    return {
      method: 'POST',
      url: this.url,
      headers: { ...this.headers },
      body: form,
    };
  }

  private async readContent(filePath: string): Promise<Uint8Array> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Cannot read ${filePath}: ${reason}`, 'filePath');
    }
  }
}

function sortKeys(metadata: Record<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(metadata).sort()) {
    sorted[key] = metadata[key];
  }
  return sorted;
}
