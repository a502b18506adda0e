/**
 * Error types for the chunked transfer client.
 *
 * Every failure surfaced by the client is a {@link TransferError}. The
 * `retryable` flag is what the transport classification and the retry
 * executor rely on; subclasses fix it per category.
 */

/**
 * Error codes for transfer errors.
 */
export enum TransferErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  NoCredentials = 'NO_CREDENTIALS',

  // Local file errors
  FileAccess = 'FILE_ACCESS_ERROR',

  // Authentication errors
  AuthenticationError = 'AUTHENTICATION_ERROR',

  // Transient remote errors
  NetworkError = 'NETWORK_ERROR',
  TimeoutError = 'TIMEOUT_ERROR',
  UnexpectedStatus = 'UNEXPECTED_STATUS',
  ResponseDecode = 'RESPONSE_DECODE_ERROR',

  // Run-level errors
  RetriesExhausted = 'RETRIES_EXHAUSTED',
  UploadAborted = 'UPLOAD_ABORTED',
  ChunkProcessing = 'CHUNK_PROCESSING_ERROR',
  ProgressCallback = 'PROGRESS_CALLBACK_ERROR',
  ProtocolInvariant = 'PROTOCOL_INVARIANT_VIOLATION',
}

/**
 * Remote operations of the transfer protocol.
 */
export type TransferOperation = 'create' | 'probe' | 'upload' | 'finalize';

/**
 * Base transfer error class.
 */
export class TransferError extends Error {
  /** Error code */
  readonly code: TransferErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: TransferErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'TransferError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: TransferErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      retryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * No credentials configured.
 */
export class NoCredentialsError extends TransferError {
  constructor() {
    super({
      code: TransferErrorCode.NoCredentials,
      message: 'Missing user or token: both are required before uploading',
      retryable: false,
    });
    this.name = 'NoCredentialsError';
  }
}

// ============================================================================
// Local File Errors (Non-Retryable)
// ============================================================================

/**
 * The source file could not be stat'ed, opened or read.
 */
export class FileAccessError extends TransferError {
  constructor(path: string, action: 'stat' | 'open' | 'read', cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super({
      code: TransferErrorCode.FileAccess,
      message: `Cannot ${action} ${path}${reason}`,
      retryable: false,
      details: { path, action },
      cause,
    });
    this.name = 'FileAccessError';
  }
}

// ============================================================================
// Authentication Errors (Fatal)
// ============================================================================

/**
 * The service rejected the credentials.
 */
export class AuthenticationError extends TransferError {
  constructor(message: string = 'Authentication failed') {
    super({
      code: TransferErrorCode.AuthenticationError,
      message,
      statusCode: 401,
      retryable: false,
    });
    this.name = 'AuthenticationError';
  }
}

// ============================================================================
// Transient Remote Errors (Retryable)
// ============================================================================

/**
 * Base class for failures worth another attempt.
 */
export class TransientRemoteError extends TransferError {
  constructor(options: {
    code: TransferErrorCode;
    message: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super({ ...options, retryable: true });
    this.name = 'TransientRemoteError';
  }
}

/**
 * Network error.
 */
export class NetworkError extends TransientRemoteError {
  constructor(message: string, cause?: unknown) {
    super({
      code: TransferErrorCode.NetworkError,
      message: `Network error: ${message}`,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Request timeout.
 */
export class TimeoutError extends TransientRemoteError {
  constructor(timeoutMs: number) {
    super({
      code: TransferErrorCode.TimeoutError,
      message: `Request timed out after ${timeoutMs}ms`,
      details: { timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Status code outside the set the operation expects.
 */
export class UnexpectedStatusError extends TransientRemoteError {
  constructor(operation: TransferOperation, statusCode: number, body?: string) {
    super({
      code: TransferErrorCode.UnexpectedStatus,
      message: `${operation} status ${statusCode}`,
      statusCode,
      details: { operation, body: body?.slice(0, 512) },
    });
    this.name = 'UnexpectedStatusError';
  }
}

/**
 * Response body did not match the expected shape.
 */
export class ResponseDecodeError extends TransientRemoteError {
  constructor(operation: TransferOperation, reason: string) {
    super({
      code: TransferErrorCode.ResponseDecode,
      message: `Malformed ${operation} response: ${reason}`,
      details: { operation, reason },
    });
    this.name = 'ResponseDecodeError';
  }
}

// ============================================================================
// Run-Level Errors
// ============================================================================

/**
 * Retry budget spent without a successful attempt.
 */
export class RetriesExhaustedError extends TransferError {
  /** Attempts made, including the first one */
  readonly attempts: number;

  constructor(attempts: number, lastError: TransferError) {
    super({
      code: TransferErrorCode.RetriesExhausted,
      message: `Giving up after ${attempts} attempts: ${lastError.message}`,
      statusCode: lastError.statusCode,
      retryable: false,
      details: { attempts, lastErrorCode: lastError.code },
      cause: lastError,
    });
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * The run was cancelled, by the caller or by a failure elsewhere in the run.
 */
export class UploadAbortedError extends TransferError {
  constructor(reason?: unknown) {
    super({
      code: TransferErrorCode.UploadAborted,
      message: 'Upload aborted',
      retryable: false,
      cause: reason,
    });
    this.name = 'UploadAbortedError';
  }
}

/**
 * A chunk worker failed. Carries the chunk index and the failing operation.
 */
export class ChunkProcessingError extends TransferError {
  /** 0-based chunk index */
  readonly index: number;
  /** Operation that failed */
  readonly operation: TransferOperation;

  constructor(index: number, operation: TransferOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: TransferErrorCode.ChunkProcessing,
      message: `Chunk ${index} failed during ${operation}: ${reason}`,
      statusCode: cause instanceof TransferError ? cause.statusCode : undefined,
      retryable: false,
      details: { index, operation },
      cause,
    });
    this.name = 'ChunkProcessingError';
    this.index = index;
    this.operation = operation;
  }
}

/**
 * The caller's progress callback threw.
 */
export class ProgressCallbackError extends TransferError {
  /** 0-based index of the chunk being reported */
  readonly index: number;

  constructor(index: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: TransferErrorCode.ProgressCallback,
      message: `Progress callback failed for chunk ${index}: ${reason}`,
      retryable: false,
      details: { index },
      cause,
    });
    this.name = 'ProgressCallbackError';
    this.index = index;
  }
}

/**
 * Internal accounting broke an invariant of the protocol.
 */
export class ProtocolInvariantError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: TransferErrorCode.ProtocolInvariant,
      message: `Protocol invariant violated: ${message}`,
      retryable: false,
      details,
    });
    this.name = 'ProtocolInvariantError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Checks if an error is a transfer error.
 */
export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  return isTransferError(error) && error.retryable;
}

/**
 * Walks the cause chain looking for an authentication failure.
 */
export function isAuthenticationFailure(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof AuthenticationError) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

/**
 * Normalizes anything thrown into a transfer error.
 */
export function toTransferError(error: unknown): TransferError {
  if (isTransferError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, error);
}
