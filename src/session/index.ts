/**
 * One remote upload session: create, probe, upload, finalize.
 *
 * Each operation runs inside its own retry loop. The session id is assigned
 * by `create()`; the other operations refuse to run without it.
 */

import { z } from 'zod';
import {
  ProtocolInvariantError,
  type TransferOperation,
} from '../errors/index.js';
import { createNoopObservability, type Observability } from '../observability/index.js';
import type { RetryExecutor } from '../resilience/index.js';
import type { TransportClient } from '../transport/index.js';
import { toWireChunk, type ContentIdentifier, type OrderedIdentifierList } from '../content/index.js';

// ============================================================================
// Response Schemas
// ============================================================================

export const CreateUploadResponseSchema = z.object({
  uploadId: z.string().min(1),
});

export const ProbeResponseSchema = z.object({
  data: z.object({
    results: z.record(z.object({ exists: z.boolean() })),
  }),
});

export type CreateUploadResponse = z.infer<typeof CreateUploadResponseSchema>;
export type ProbeResponse = z.infer<typeof ProbeResponseSchema>;

/**
 * Key the probe response uses for a chunk.
 */
export function probeResultKey(identifier: ContentIdentifier): string {
  return `sha256-${identifier.digest}`;
}

// ============================================================================
// Upload Session
// ============================================================================

/**
 * Upload session options.
 */
export interface UploadSessionOptions {
  /** Authenticated transport */
  client: TransportClient;
  /** Retry loop for every operation */
  retry: RetryExecutor;
  /** Target resource the file is attached to */
  resourceKey: string;
  observability?: Observability;
}

export class UploadSession {
  private readonly client: TransportClient;
  private readonly retry: RetryExecutor;
  private readonly observability: Observability;
  private readonly basePath: string;
  private uploadId?: string;

  readonly resourceKey: string;

  constructor(options: UploadSessionOptions) {
    if (options.resourceKey.trim().length === 0) {
      throw new ProtocolInvariantError('resource key cannot be empty');
    }
    this.client = options.client;
    this.retry = options.retry;
    this.resourceKey = options.resourceKey;
    this.observability = options.observability ?? createNoopObservability();
    this.basePath = `/api/upload/${encodeURIComponent(options.resourceKey)}`;
  }

  /** Session id, once created */
  get id(): string | undefined {
    return this.uploadId;
  }

  /**
   * Opens the session on the server.
   */
  async create(signal?: AbortSignal): Promise<string> {
    if (this.uploadId !== undefined) {
      throw new ProtocolInvariantError('upload session already created', { uploadId: this.uploadId });
    }

    const response = await this.retry.execute(
      () =>
        this.client.callJson(
          {
            operation: 'create',
            path: `${this.basePath}/create`,
            expectedStatus: [201],
            signal,
          },
          CreateUploadResponseSchema
        ),
      signal
    );

    this.uploadId = response.uploadId;
    this.observability.logger.info('Upload session created', {
      resourceKey: this.resourceKey,
      uploadId: response.uploadId,
    });
    return response.uploadId;
  }

  /**
   * Asks whether the server already holds a chunk.
   */
  async probe(identifier: ContentIdentifier, signal?: AbortSignal): Promise<boolean> {
    const uploadId = this.requireUploadId('probe');

    const response = await this.retry.execute(
      () =>
        this.client.callJson(
          {
            operation: 'probe',
            path: `${this.basePath}/chunk/probe`,
            query: { uploadId },
            json: { chunks: [toWireChunk(identifier)] },
            expectedStatus: [200],
            signal,
          },
          ProbeResponseSchema
        ),
      signal
    );

    return response.data.results[probeResultKey(identifier)]?.exists ?? false;
  }

  /**
   * Sends a chunk as a multipart form, field `chunk`.
   */
  async upload(
    identifier: ContentIdentifier,
    bytes: Uint8Array,
    partNumber: number,
    fileName: string,
    signal?: AbortSignal
  ): Promise<void> {
    const uploadId = this.requireUploadId('upload');

    if (bytes.byteLength !== identifier.size) {
      throw new ProtocolInvariantError('chunk length does not match its identifier', {
        identifier: identifier.value,
        length: bytes.byteLength,
      });
    }

    // One Blob for every attempt
    const blob = new Blob([bytes]);

    await this.retry.execute(() => {
      const form = new FormData();
      form.append('chunk', blob, fileName);
      return this.client.call({
        operation: 'upload',
        path: `${this.basePath}/chunk/${encodeURIComponent(identifier.value)}`,
        query: { uploadId, partNumber },
        form,
        expectedStatus: [200, 201],
        signal,
      });
    }, signal);
  }

  /**
   * Commits the ordered chunk list as one file.
   */
  async finalize(
    identifiers: OrderedIdentifierList,
    fileName: string,
    mimeType: string,
    signal?: AbortSignal
  ): Promise<void> {
    const uploadId = this.requireUploadId('finalize');

    await this.retry.execute(
      () =>
        this.client.call({
          operation: 'finalize',
          path: `${this.basePath}/file/chunked`,
          query: { uploadId },
          json: {
            chunks: identifiers.map(toWireChunk),
            name: fileName,
            mimeType,
          },
          expectedStatus: [200, 201],
          signal,
        }),
      signal
    );

    this.observability.logger.info('Upload finalized', {
      resourceKey: this.resourceKey,
      uploadId,
      chunks: identifiers.length,
    });
  }

  private requireUploadId(operation: TransferOperation): string {
    if (this.uploadId === undefined) {
      throw new ProtocolInvariantError(`${operation} called before the session was created`);
    }
    return this.uploadId;
  }
}
