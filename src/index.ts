/**
 * Chunked file transfer client.
 *
 * Uploads one large file to a remote transfer service in content-addressed
 * chunks:
 * - Chunk size picked from the file size
 * - SHA-256 identifiers, so chunks the server already holds are skipped
 * - Bounded parallel probe/upload with retry and backoff
 * - Ordered finalize, only after every chunk succeeded
 *
 * @module chunked-transfer
 */

// ============================================================================
// Client
// ============================================================================

export {
  TransferClient,
  createTransferClient,
  createTransferClientFromEnv,
  type TransferClientOptions,
  type UploadOptions,
  type UploadProgress,
  type UploadResult,
} from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  TransferConfigBuilder,
  SecretString,
  validateConfig,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_USER_AGENT,
  type TransferConfig,
  type RetryConfig,
  type Credentials,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export * from './errors/index.js';

// ============================================================================
// Pipeline Components
// ============================================================================

export * from './planner/index.js';
export * from './content/index.js';
export * from './transport/index.js';
export * from './resilience/index.js';
export * from './concurrency/index.js';
export * from './session/index.js';
export * from './dispatcher/index.js';
export * from './aggregator/index.js';
export { guessMimeType, DEFAULT_MIME_TYPE } from './mime/index.js';
export { BasicAuthProvider, createAuthProvider, type AuthProvider } from './auth/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';

// ============================================================================
// Testing
// ============================================================================

export * from './mocks/index.js';
