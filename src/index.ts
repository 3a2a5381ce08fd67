/**
 * DAM Upload Client SDK
 * Batch upload and asset API client for the DAM service
 */

// Main SDK class
export { DamClient } from './client.js';
export type { BatchHandle } from './client.js';

// Configuration
export {
  resolveConfig,
  resolveRetryPolicy,
  loadConfigFromEnv,
  DEFAULT_API_URL,
  DEFAULT_CONCURRENCY_LIMIT,
  SDK_VERSION,
} from './config.js';

// Building blocks
export { BatchUploadCoordinator } from './lib/coordinator.js';
export type { RequestBuilder, CoordinatorDeps } from './lib/coordinator.js';
export { UploadRequestBuilder } from './lib/request-builder.js';
export { ResultAggregator } from './lib/aggregator.js';
export { AxiosTransport } from './lib/transport.js';
export type { Transport, TransportRequest, TransportResponse, HttpMethod } from './lib/transport.js';
export { isImage, isVideo, isDocument } from './lib/models.js';
export { DEFAULT_RETRY_POLICY, computeBackoffDelay } from './utils/retry.js';

// Type exports
export type * from './types/index.js';

// Error classes
export {
  DamError,
  ValidationError,
  FileTooLargeError,
  ConfigurationError,
  ApiError,
  AuthError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  TransportError,
  CancelledError,
} from './utils/errors.js';
