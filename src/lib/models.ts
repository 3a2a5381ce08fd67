/**
 * Conversion of API payloads into SDK models
 */

import type { DamFile, Pagination } from '../types/api.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function optionalDate(value: unknown): Date | undefined {
  if (typeof value !== 'string') return undefined;
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : new Date(time);
}

/**
 * Build a DamFile from a file record; returns null when required fields are missing
 */
export function toDamFile(record: unknown): DamFile | null {
  if (!isRecord(record)) return null;

  const { id, size, file_url: fileUrl } = record;
  if (typeof id !== 'string' || id.length === 0) return null;
  if (typeof fileUrl !== 'string' || typeof size !== 'number') return null;

  return {
    id,
    filename: optionalString(record.filename) ?? '',
    originalName: optionalString(record.original_name) ?? '',
    mimeType: optionalString(record.mime_type) ?? 'application/octet-stream',
    size,
    storagePath: optionalString(record.storage_path) ?? '',
    fileUrl,
    userId: optionalString(record.user_id) ?? '',
    folderId: optionalString(record.folder_id),
    width: optionalNumber(record.width),
    height: optionalNumber(record.height),
    duration: optionalNumber(record.duration),
    metadata: isRecord(record.metadata) ? record.metadata : {},
    checksum: optionalString(record.checksum),
    isPublic: typeof record.is_public === 'boolean' ? record.is_public : true,
    downloadCount: optionalNumber(record.download_count) ?? 0,
    createdAt: optionalDate(record.created_at),
    updatedAt: optionalDate(record.updated_at),
  };
}

/**
 * Unwrap the `data` member of an API envelope
 */
export function envelopeData(body: unknown): unknown {
  return isRecord(body) && 'data' in body ? body.data : undefined;
}

export function toPagination(value: unknown, fallbackCount: number): Pagination {
  const source = isRecord(value) ? value : {};
  const total = optionalNumber(source.total) ?? fallbackCount;
  const limit = optionalNumber(source.limit) ?? fallbackCount;
  const offset = optionalNumber(source.offset) ?? 0;
  const hasMore =
    typeof source.has_more === 'boolean'
      ? source.has_more
      : typeof source.hasMore === 'boolean'
        ? source.hasMore
        : offset + fallbackCount < total;
  return { total, limit, offset, hasMore };
}

export function isImage(file: DamFile): boolean {
  return file.mimeType.startsWith('image/');
}

export function isVideo(file: DamFile): boolean {
  return file.mimeType.startsWith('video/');
}

const DOCUMENT_TYPES = new Set([
  'application/pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'application/vnd.ms-excel',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
]);

export function isDocument(file: DamFile): boolean {
  return DOCUMENT_TYPES.has(file.mimeType);
}
