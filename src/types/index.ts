/**
 * Type Definitions Export
 */

// SDK Configuration Types
export type {
  DamClientConfig,
  ResolvedConfig,
  UploadOptions,
  UploadOneOptions,
} from './config.js';

// API Types
export type {
  FileRecord,
  DamFile,
  ApiEnvelope,
  ErrorResponse,
  Pagination,
  FileListResponse,
  SearchOptions,
  TransformFit,
  TransformFormat,
  TransformOptions,
  BatchDeleteResult,
  DashboardStats,
  StorageStats,
} from './api.js';

// Batch Types
export type {
  UploadItem,
  BatchRequest,
  ErrorKind,
  UploadSuccess,
  UploadFailure,
  UploadOutcome,
  BatchSummary,
  BatchReport,
  RetryPolicy,
  BatchProgress,
  SubmitOptions,
} from './batch.js';
