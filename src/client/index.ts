/**
 * Transfer client: uploads one file to a resource in content-addressed chunks.
 */

import { open, stat, type FileHandle } from 'node:fs/promises';
import { basename } from 'node:path';
import { TransferConfigBuilder, validateConfig, type TransferConfig } from '../config/index.js';
import { ConfigurationError, FileAccessError } from '../errors/index.js';
import { createAuthProvider } from '../auth/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import { createRetryExecutor, type RetryExecutor } from '../resilience/index.js';
import { TransportClient, createFetchTransport, type HttpTransport } from '../transport/index.js';
import { computeChunkSize, estimateChunkCount, planChunks } from '../planner/index.js';
import { UploadSession } from '../session/index.js';
import { ChunkDispatcher, type ChunkProgressEvent } from '../dispatcher/index.js';
import { guessMimeType } from '../mime/index.js';
import type { ContentIdentifier } from '../content/index.js';

// ============================================================================
// Upload Types
// ============================================================================

/**
 * Progress of a running upload.
 */
export interface UploadProgress extends ChunkProgressEvent {
  /** Planned chunk count; one high when the size divides evenly */
  estimatedChunks: number;
  /** File size in bytes */
  totalBytes: number;
}

/**
 * Per-call upload options.
 */
export interface UploadOptions {
  /** Cancels the upload */
  signal?: AbortSignal;
  /** Called after each chunk finishes */
  onProgress?: (progress: UploadProgress) => void;
  /** Overrides the extension-based MIME type */
  mimeType?: string;
  /** Overrides the configured or planned chunk size */
  chunkSize?: number;
  /** Overrides the configured concurrency */
  concurrency?: number;
}

/**
 * Result of a finished upload.
 */
export interface UploadResult {
  uploadId: string;
  resourceKey: string;
  fileName: string;
  mimeType: string;
  /** File size in bytes */
  size: number;
  chunkSize: number;
  /** Identifiers in chunk order, as sent to finalize */
  chunks: ContentIdentifier[];
  /** Chunks sent to the server */
  uploadedChunks: number;
  /** Chunks the server already held */
  deduplicatedChunks: number;
}

/**
 * Client construction options.
 */
export interface TransferClientOptions {
  observability?: Observability;
  /** HTTP transport; defaults to fetch */
  transport?: HttpTransport;
}

// ============================================================================
// Transfer Client
// ============================================================================

export class TransferClient {
  private readonly config: TransferConfig;
  private readonly observability: Observability;
  private readonly transport: TransportClient;
  private readonly retry: RetryExecutor;
  private readonly dispatcher: ChunkDispatcher;

  constructor(config: TransferConfig, options: TransferClientOptions = {}) {
    validateConfig(config);
    this.config = config;
    this.observability = options.observability ?? createNoopObservability();
    this.transport = new TransportClient({
      baseUrl: config.baseUrl,
      auth: createAuthProvider(config.credentials),
      transport: options.transport ?? createFetchTransport(),
      requestTimeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
      observability: this.observability,
    });
    this.retry = createRetryExecutor(config.retryConfig, this.observability);
    this.dispatcher = new ChunkDispatcher(this.observability);
  }

  /**
   * Gets the configuration.
   */
  get configuration(): TransferConfig {
    return this.config;
  }

  /**
   * Uploads a file and attaches it to `resourceKey`.
   *
   * Either every chunk is stored and the file finalized, or the call rejects
   * with the first error and nothing is finalized.
   */
  async uploadFile(filePath: string, resourceKey: string, options: UploadOptions = {}): Promise<UploadResult> {
    const { logger, metrics } = this.observability;
    if (resourceKey.trim().length === 0) {
      throw new ConfigurationError('Resource key cannot be empty');
    }
    const fileName = basename(filePath);

    const size = await this.statFile(filePath);
    const chunkSize = options.chunkSize ?? this.config.chunkSize ?? computeChunkSize(size);
    const concurrency = options.concurrency ?? this.config.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    const estimatedChunks = estimateChunkCount(size, chunkSize);
    const mimeType = options.mimeType ?? guessMimeType(fileName);

    logger.info('Starting upload', { resourceKey, fileName, size, chunkSize, estimatedChunks });

    const session = new UploadSession({
      client: this.transport,
      retry: this.retry,
      resourceKey,
      observability: this.observability,
    });
    const handle = await this.openFile(filePath);

    try {
      const uploadId = await session.create(options.signal);

      const onProgress = options.onProgress;
      const dispatched = await this.dispatcher.dispatch(session, handle, {
        chunkSize,
        concurrency,
        fileName,
        filePath,
        signal: options.signal,
        onProgress: onProgress && ((event) => onProgress({ ...event, estimatedChunks, totalBytes: size })),
      });

      const plannedChunks = planChunks(size, chunkSize).length;
      if (dispatched.identifiers.length !== plannedChunks || dispatched.bytesRead !== size) {
        logger.warn('File changed while reading', {
          filePath,
          plannedChunks,
          readChunks: dispatched.identifiers.length,
          statSize: size,
          bytesRead: dispatched.bytesRead,
        });
      }

      await session.finalize(dispatched.identifiers, fileName, mimeType, options.signal);

      metrics.increment(MetricNames.UPLOADS_COMPLETED);
      logger.info('Upload complete', {
        resourceKey,
        uploadId,
        chunks: dispatched.identifiers.length,
        uploaded: dispatched.uploadedChunks,
        deduplicated: dispatched.deduplicatedChunks,
      });

      return {
        uploadId,
        resourceKey,
        fileName,
        mimeType,
        size,
        chunkSize,
        chunks: [...dispatched.identifiers],
        uploadedChunks: dispatched.uploadedChunks,
        deduplicatedChunks: dispatched.deduplicatedChunks,
      };
    } catch (error) {
      metrics.increment(MetricNames.UPLOADS_FAILED);
      logger.error('Upload failed', {
        resourceKey,
        fileName,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      await handle.close();
    }
  }

  private async statFile(filePath: string): Promise<number> {
    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        throw new Error('not a regular file');
      }
      return info.size;
    } catch (error) {
      throw new FileAccessError(filePath, 'stat', error);
    }
  }

  private async openFile(filePath: string): Promise<FileHandle> {
    try {
      return await open(filePath, 'r');
    } catch (error) {
      throw new FileAccessError(filePath, 'open', error);
    }
  }
}

// ============================================================================
// Client Factory
// ============================================================================

/**
 * Creates a transfer client from a configuration.
 */
export function createTransferClient(config: TransferConfig, options?: TransferClientOptions): TransferClient {
  return new TransferClient(config, options);
}

/**
 * Creates a transfer client from environment variables.
 */
export function createTransferClientFromEnv(options?: TransferClientOptions): TransferClient {
  const config = TransferConfigBuilder.fromEnv().build();
  return new TransferClient(config, options);
}
