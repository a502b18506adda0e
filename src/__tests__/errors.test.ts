/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  ChunkProcessingError,
  ConfigurationError,
  FileAccessError,
  NetworkError,
  RetriesExhaustedError,
  TimeoutError,
  TransferErrorCode,
  UnexpectedStatusError,
  isAuthenticationFailure,
  isRetryableError,
  toTransferError,
} from '../errors/index.js';

describe('TransferError', () => {
  it('should mark transient errors retryable', () => {
    expect(isRetryableError(new NetworkError('reset'))).toBe(true);
    expect(isRetryableError(new TimeoutError(100))).toBe(true);
    expect(isRetryableError(new UnexpectedStatusError('probe', 503))).toBe(true);
  });

  it('should mark everything else non-retryable', () => {
    expect(isRetryableError(new AuthenticationError())).toBe(false);
    expect(isRetryableError(new ConfigurationError('bad'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should describe an unexpected status with its operation', () => {
    const error = new UnexpectedStatusError('finalize', 500, 'oops');

    expect(error.message).toBe('finalize status 500');
    expect(error.statusCode).toBe(500);
    expect(error.details).toEqual({ operation: 'finalize', body: 'oops' });
  });

  it('should carry chunk index and operation', () => {
    const error = new ChunkProcessingError(2, 'probe', new UnexpectedStatusError('probe', 503));

    expect(error.message).toBe('Chunk 2 failed during probe: probe status 503');
    expect(error.index).toBe(2);
    expect(error.operation).toBe('probe');
    expect(error.statusCode).toBe(503);
    expect(error.code).toBe(TransferErrorCode.ChunkProcessing);
  });

  it('should find an authentication failure through causes', () => {
    const wrapped = new ChunkProcessingError(3, 'probe', new AuthenticationError());

    expect(isAuthenticationFailure(wrapped)).toBe(true);
    expect(isAuthenticationFailure(new ChunkProcessingError(3, 'probe', new NetworkError('reset')))).toBe(false);
  });

  it('should keep the last error of an exhausted retry', () => {
    const last = new TimeoutError(250);
    const error = new RetriesExhaustedError(4, last);

    expect(error.attempts).toBe(4);
    expect(error.cause).toBe(last);
    expect(error.message).toBe('Giving up after 4 attempts: Request timed out after 250ms');
  });

  it('should serialize to JSON', () => {
    const error = new FileAccessError('/tmp/missing.bin', 'stat');

    expect(error.toJSON()).toEqual({
      name: 'FileAccessError',
      code: TransferErrorCode.FileAccess,
      message: 'Cannot stat /tmp/missing.bin',
      statusCode: undefined,
      retryable: false,
      details: { path: '/tmp/missing.bin', action: 'stat' },
    });
  });
});

describe('toTransferError', () => {
  it('should pass transfer errors through', () => {
    const error = new AuthenticationError();
    expect(toTransferError(error)).toBe(error);
  });

  it('should wrap anything else as a network error', () => {
    const error = toTransferError(new Error('socket hang up'));

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe('Network error: socket hang up');
  });
});
