/**
 * DAM API wire types and the SDK models built from them
 */

/**
 * File record as returned by the API (snake_case)
 */
export interface FileRecord {
  id: string;
  filename: string;
  original_name: string;
  mime_type: string;
  size: number;
  storage_path: string;
  file_url: string;
  user_id: string;
  folder_id?: string | null;
  width?: number | null;
  height?: number | null;
  duration?: number | null;
  metadata?: Record<string, unknown>;
  checksum?: string | null;
  is_public?: boolean;
  download_count?: number;
  created_at?: string | null;
  updated_at?: string | null;
}

/**
 * Asset stored in the DAM
 */
export interface DamFile {
  id: string;
  filename: string;
  originalName: string;
  mimeType: string;
  size: number;
  storagePath: string;
  fileUrl: string;
  userId: string;
  folderId?: string;
  width?: number;
  height?: number;
  duration?: number;
  metadata: Record<string, unknown>;
  checksum?: string;
  isPublic: boolean;
  downloadCount: number;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface ApiEnvelope<T> {
  success: boolean;
  message?: string;
  data: T;
}

export interface ErrorResponse {
  success?: false;
  message?: string;
  error?: string;
  details?: unknown;
}

export interface Pagination {
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export interface FileListResponse {
  files: DamFile[];
  pagination: Pagination;
}

export interface SearchOptions {
  folderId?: string;
  mimeType?: string;
  search?: string;
  /** @default 50 */
  limit?: number;
  /** @default 0 */
  offset?: number;
  /** @default 'created_at' */
  sort?: string;
  /** @default 'desc' */
  order?: 'asc' | 'desc';
}

export type TransformFit = 'cover' | 'contain' | 'fill' | 'inside' | 'outside';

export type TransformFormat = 'jpeg' | 'jpg' | 'png' | 'webp' | 'avif' | 'gif';

/**
 * Image transformation applied by the service when serving a file
 */
export interface TransformOptions {
  width?: number;
  height?: number;
  /** @default 'cover' */
  fit?: TransformFit;
  format?: TransformFormat;
  /** 1-100, @default 80 */
  quality?: number;
  blur?: number;
  grayscale?: boolean;
  rotate?: number;
}

/**
 * Bulk-delete and statistics payloads are passed through as the service returns them
 */
export type BatchDeleteResult = Record<string, unknown>;

export type DashboardStats = Record<string, unknown>;

export type StorageStats = Record<string, unknown>;
