/**
 * Reads a file sequentially and fans its chunks out to bounded workers.
 */

import {
  ChunkProcessingError,
  FileAccessError,
  ProgressCallbackError,
  UploadAbortedError,
  toTransferError,
  type TransferOperation,
} from '../errors/index.js';
import { AdmissionGate } from '../concurrency/index.js';
import { createContentIdentifier, type OrderedIdentifierList } from '../content/index.js';
import { ResultAggregator, type ChunkResult } from '../aggregator/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import type { UploadSession } from '../session/index.js';

/**
 * Positional reader over the source file. A `FileHandle` satisfies it.
 */
export interface ChunkSource {
  read(buffer: Buffer, offset: number, length: number, position: number): Promise<{ bytesRead: number }>;
}

/**
 * Progress event, emitted once per finished chunk.
 */
export interface ChunkProgressEvent {
  /** 0-based chunk index */
  index: number;
  /** Chunk length in bytes */
  size: number;
  /** True when the server already held the chunk */
  deduplicated: boolean;
  /** Chunks finished so far, in any order */
  completedChunks: number;
  /** Bytes finished so far */
  completedBytes: number;
}

export interface DispatchOptions {
  /** Bytes per chunk */
  chunkSize: number;
  /** Chunks in flight at once */
  concurrency: number;
  /** Source base name, sent with every uploaded chunk */
  fileName: string;
  /** Path used in file access errors */
  filePath?: string;
  signal?: AbortSignal;
  onProgress?: (event: ChunkProgressEvent) => void;
}

export interface DispatchResult {
  /** Identifiers in chunk order */
  identifiers: OrderedIdentifierList;
  /** Chunks sent to the server */
  uploadedChunks: number;
  /** Chunks the server already held */
  deduplicatedChunks: number;
  /** Bytes read from the source */
  bytesRead: number;
}

interface Chunk {
  index: number;
  bytes: Buffer;
}

interface RunState {
  session: UploadSession;
  gate: AdmissionGate;
  aggregator: ResultAggregator;
  signal: AbortSignal;
  options: DispatchOptions;
  uploaded: number;
  deduplicated: number;
  completedChunks: number;
  completedBytes: number;
}

/**
 * Chunk dispatcher
 *
 * A permit is taken before each read, so at most `concurrency` chunk buffers
 * are alive at once. The first failing worker aborts the whole run.
 */
export class ChunkDispatcher {
  private readonly observability: Observability;

  constructor(observability: Observability = createNoopObservability()) {
    this.observability = observability;
  }

  /**
   * Uploads every chunk of `source` through `session`.
   * @throws the first worker failure, FileAccessError, or UploadAbortedError
   */
  async dispatch(session: UploadSession, source: ChunkSource, options: DispatchOptions): Promise<DispatchResult> {
    const external = options.signal;
    if (external?.aborted) {
      throw new UploadAbortedError(external.reason);
    }

    const controller = new AbortController();
    const state: RunState = {
      session,
      gate: new AdmissionGate(options.concurrency),
      aggregator: new ResultAggregator({ onFailure: (error) => controller.abort(error) }),
      signal: controller.signal,
      options,
      uploaded: 0,
      deduplicated: 0,
      completedChunks: 0,
      completedBytes: 0,
    };

    const forwardAbort = (): void => controller.abort(external?.reason);
    external?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const { tasks, enumerated, bytesRead } = await this.enumerate(source, state, controller);

      const failure = await Promise.race([
        Promise.all(tasks).then(() => undefined),
        state.aggregator.failure,
      ]);
      if (failure) {
        throw failure;
      }

      return {
        identifiers: state.aggregator.finish(enumerated),
        uploadedChunks: state.uploaded,
        deduplicatedChunks: state.deduplicated,
        bytesRead,
      };
    } catch (error) {
      controller.abort(error);
      throw state.aggregator.error ?? toTransferError(error);
    } finally {
      external?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Reads chunks in file order and starts a worker for each.
   */
  private async enumerate(
    source: ChunkSource,
    state: RunState,
    controller: AbortController
  ): Promise<{ tasks: Promise<void>[]; enumerated: number; bytesRead: number }> {
    const { chunkSize, fileName, filePath } = state.options;
    const tasks: Promise<void>[] = [];
    let index = 0;
    let position = 0;

    for (;;) {
      await state.gate.acquire(controller.signal);

      const buffer = Buffer.alloc(chunkSize);
      let bytesRead: number;
      try {
        ({ bytesRead } = await source.read(buffer, 0, chunkSize, position));
      } catch (error) {
        state.gate.release();
        throw new FileAccessError(filePath ?? fileName, 'read', error);
      }

      if (controller.signal.aborted) {
        state.gate.release();
        throw new UploadAbortedError(controller.signal.reason);
      }

      if (bytesRead === 0 && index > 0) {
        state.gate.release();
        break;
      }

      tasks.push(this.runWorker({ index, bytes: buffer.subarray(0, bytesRead) }, state));
      index++;
      position += bytesRead;

      if (bytesRead < chunkSize) {
        break;
      }
    }

    this.observability.logger.debug('File enumerated', { chunks: index, bytes: position });
    return { tasks, enumerated: index, bytesRead: position };
  }

  private async runWorker(chunk: Chunk, state: RunState): Promise<void> {
    let result: ChunkResult;
    try {
      result = await this.processChunk(chunk, state);
    } finally {
      state.gate.release();
    }
    state.aggregator.record(result);

    if (result.error === undefined && !state.aggregator.failed) {
      try {
        this.reportProgress(chunk, result.deduplicated, state);
      } catch (error) {
        state.aggregator.record({ index: chunk.index, error: new ProgressCallbackError(chunk.index, error) });
      }
    }
  }

  /**
   * Hashes, probes and, if needed, uploads one chunk. Never rejects.
   */
  private async processChunk(chunk: Chunk, state: RunState): Promise<ChunkResult> {
    const { logger } = this.observability;
    let operation: TransferOperation = 'probe';

    try {
      const identifier = createContentIdentifier(chunk.bytes);
      const exists = await state.session.probe(identifier, state.signal);

      if (exists) {
        logger.debug('Chunk already stored', { index: chunk.index, identifier: identifier.value });
      } else {
        operation = 'upload';
        await state.session.upload(identifier, chunk.bytes, chunk.index + 1, state.options.fileName, state.signal);
        logger.debug('Chunk uploaded', { index: chunk.index, identifier: identifier.value });
      }

      return { index: chunk.index, identifier, deduplicated: exists };
    } catch (error) {
      if (error instanceof UploadAbortedError) {
        return { index: chunk.index, error };
      }
      return { index: chunk.index, error: new ChunkProcessingError(chunk.index, operation, error) };
    }
  }

  private reportProgress(chunk: Chunk, deduplicated: boolean, state: RunState): void {
    const { metrics } = this.observability;
    const size = chunk.bytes.byteLength;

    if (deduplicated) {
      state.deduplicated++;
      metrics.increment(MetricNames.CHUNKS_DEDUPLICATED);
    } else {
      state.uploaded++;
      metrics.increment(MetricNames.CHUNKS_UPLOADED);
      metrics.increment(MetricNames.BYTES_UPLOADED, size);
    }
    state.completedChunks++;
    state.completedBytes += size;

    state.options.onProgress?.({
      index: chunk.index,
      size,
      deduplicated,
      completedChunks: state.completedChunks,
      completedBytes: state.completedBytes,
    });
  }
}
