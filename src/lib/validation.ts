/**
 * Validation utilities for paths, files, metadata and configuration
 */

import type { TransformFit, TransformFormat, TransformOptions } from '../types/api.js';
import { FileTooLargeError, ValidationError } from '../utils/errors.js';

export const MAX_FILE_SIZE = 100 * 1024 * 1024; // 100 MB
export const MAX_METADATA_KEY_LENGTH = 128;

// Invalid path characters
const INVALID_PATH_CHARS = /[<>:"|?*\x00-\x1f]/;

// Characters replaced in uploaded file names
const INVALID_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

const TRANSFORM_FITS: readonly TransformFit[] = ['cover', 'contain', 'fill', 'inside', 'outside'];

const TRANSFORM_FORMATS: readonly TransformFormat[] = ['jpeg', 'jpg', 'png', 'webp', 'avif', 'gif'];

const MIME_TYPES: Record<string, string> = {
  // Images
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  avif: 'image/avif',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  bmp: 'image/bmp',
  svg: 'image/svg+xml',

  // Documents
  pdf: 'application/pdf',
  txt: 'text/plain',
  csv: 'text/csv',
  json: 'application/json',
  xml: 'application/xml',
  doc: 'application/msword',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  xls: 'application/vnd.ms-excel',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',

  // Archives
  zip: 'application/zip',

  // Audio
  mp3: 'audio/mpeg',
  wav: 'audio/wav',

  // Video
  mp4: 'video/mp4',
  webm: 'video/webm',
  mov: 'video/quicktime',
};

/**
 * Get lower-case file extension (without the dot)
 */
export function getExtension(fileName: string): string {
  const lastDot = fileName.lastIndexOf('.');
  return lastDot <= 0 ? '' : fileName.slice(lastDot + 1).toLowerCase();
}

/**
 * Get MIME type from filename
 */
export function getMimeType(fileName: string): string {
  return MIME_TYPES[getExtension(fileName)] ?? 'application/octet-stream';
}

/**
 * Strip directories and replace characters the service rejects
 */
export function sanitizeFileName(filePath: string): string {
  const base = normalizePath(filePath).split('/').pop() ?? '';
  const cleaned = base.replace(INVALID_FILENAME_CHARS, '_');
  return cleaned.length > 0 ? cleaned : 'uploaded_file';
}

/**
 * Validate file size
 */
export function validateFileSize(size: number, maxSize: number = MAX_FILE_SIZE): void {
  if (size <= 0) {
    throw new ValidationError('File size must be greater than 0', 'file');
  }
  if (size > maxSize) {
    throw new FileTooLargeError(
      `File size (${formatBytes(size)}) exceeds maximum allowed size (${formatBytes(maxSize)})`,
      size,
      maxSize
    );
  }
}

/**
 * Validate destination path format
 */
export function validateDestinationPath(path: string): void {
  if (!path.startsWith('/')) {
    throw new ValidationError('Destination path must start with /', 'destinationPath');
  }

  if (INVALID_PATH_CHARS.test(path)) {
    throw new ValidationError('Destination path contains invalid characters', 'destinationPath');
  }

  // No . or .. segments (directory traversal)
  const segments = path.split('/').filter((s) => s.length > 0);
  for (const segment of segments) {
    if (segment === '.' || segment === '..') {
      throw new ValidationError(
        'Destination path cannot contain . or .. segments',
        'destinationPath'
      );
    }
  }
}

/**
 * Validate metadata keys and values
 */
export function validateMetadata(
  metadata: Record<string, string>,
  maxKeyLength: number = MAX_METADATA_KEY_LENGTH
): void {
  for (const [key, value] of Object.entries(metadata)) {
    if (key.length === 0) {
      throw new ValidationError('Metadata keys cannot be empty', 'metadata');
    }
    if (key.length > maxKeyLength) {
      throw new ValidationError(
        `Metadata key "${key.slice(0, 32)}..." exceeds ${maxKeyLength} characters`,
        'metadata'
      );
    }
    if (typeof value !== 'string') {
      throw new ValidationError(`Metadata value for "${key}" must be a string`, 'metadata');
    }
  }
}

/**
 * Validate API URL
 */
export function validateApiUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid API URL: ${url}`, 'apiUrl');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError('Invalid API URL: protocol must be http or https', 'apiUrl');
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate image transformation options
 */
export function validateTransformOptions(options: TransformOptions): void {
  if (options.width !== undefined && !isPositiveInteger(options.width)) {
    throw new ValidationError('width must be a positive integer', 'width');
  }
  if (options.height !== undefined && !isPositiveInteger(options.height)) {
    throw new ValidationError('height must be a positive integer', 'height');
  }
  if (options.fit !== undefined && !TRANSFORM_FITS.includes(options.fit)) {
    throw new ValidationError(`fit must be one of: ${TRANSFORM_FITS.join(', ')}`, 'fit');
  }
  if (options.format !== undefined && !TRANSFORM_FORMATS.includes(options.format)) {
    throw new ValidationError(`format must be one of: ${TRANSFORM_FORMATS.join(', ')}`, 'format');
  }
  if (
    options.quality !== undefined &&
    (!Number.isInteger(options.quality) || options.quality < 1 || options.quality > 100)
  ) {
    throw new ValidationError('quality must be an integer between 1 and 100', 'quality');
  }
  if (options.blur !== undefined && !isPositiveInteger(options.blur)) {
    throw new ValidationError('blur must be a positive integer', 'blur');
  }
  if (options.rotate !== undefined && !Number.isInteger(options.rotate)) {
    throw new ValidationError('rotate must be an integer', 'rotate');
  }
}

/**
 * Convert transformation options to query parameters
 */
export function transformToQuery(options: TransformOptions): URLSearchParams {
  validateTransformOptions(options);

  const params = new URLSearchParams();
  if (options.width) params.set('w', String(options.width));
  if (options.height) params.set('h', String(options.height));
  params.set('fit', options.fit ?? 'cover');
  if (options.format) params.set('format', options.format);
  params.set('quality', String(options.quality ?? 80));
  if (options.blur) params.set('blur', String(options.blur));
  if (options.grayscale) params.set('grayscale', 'true');
  if (options.rotate) params.set('rotate', String(options.rotate));
  return params;
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return `${(bytes / Math.pow(k, i)).toFixed(2)} ${sizes[i]}`;
}

/**
 * Normalize path to POSIX format (forward slashes)
 */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/');
}
