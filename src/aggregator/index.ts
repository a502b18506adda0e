/**
 * Collects chunk results from concurrent workers and restores file order.
 */

import { ProtocolInvariantError, type TransferError } from '../errors/index.js';
import type { ContentIdentifier, OrderedIdentifierList } from '../content/index.js';

/**
 * Outcome of one chunk worker.
 */
export type ChunkResult =
  | { index: number; identifier: ContentIdentifier; deduplicated: boolean; error?: undefined }
  | { index: number; error: TransferError };

/**
 * Result aggregator
 *
 * The first failure is latched: `onFailure` fires once, `failure` settles
 * with that error, and every result recorded afterwards is dropped.
 */
export class ResultAggregator {
  private readonly received: Array<{ index: number; identifier: ContentIdentifier }> = [];
  private firstError?: TransferError;
  private readonly resolveFailure: (error: TransferError) => void;
  private readonly onFailure?: (error: TransferError) => void;

  /** Settles with the first failure; stays pending while every chunk succeeds */
  readonly failure: Promise<TransferError>;

  constructor(options: { onFailure?: (error: TransferError) => void } = {}) {
    this.onFailure = options.onFailure;
    let settle: (error: TransferError) => void = () => undefined;
    this.failure = new Promise((resolve) => {
      settle = resolve;
    });
    this.resolveFailure = settle;
  }

  /**
   * Records a worker's result.
   */
  record(result: ChunkResult): void {
    if (this.firstError) {
      return;
    }

    if (result.error) {
      this.firstError = result.error;
      this.resolveFailure(result.error);
      this.onFailure?.(result.error);
      return;
    }

    this.received.push({ index: result.index, identifier: result.identifier });
  }

  /** Whether a failure has been latched */
  get failed(): boolean {
    return this.firstError !== undefined;
  }

  /** The latched failure */
  get error(): TransferError | undefined {
    return this.firstError;
  }

  /** Successful results recorded so far */
  get count(): number {
    return this.received.length;
  }

  /**
   * Returns identifiers in chunk order once all `enumerated` chunks reported.
   * @throws the latched failure, or ProtocolInvariantError if results are
   *   missing, duplicated or out of range
   */
  finish(enumerated: number): OrderedIdentifierList {
    if (this.firstError) {
      throw this.firstError;
    }

    if (this.received.length !== enumerated) {
      throw new ProtocolInvariantError(
        `expected ${enumerated} chunk results, received ${this.received.length}`,
        { enumerated, received: this.received.length }
      );
    }

    const ordered = [...this.received].sort((a, b) => a.index - b.index);
    ordered.forEach((entry, position) => {
      if (entry.index !== position) {
        throw new ProtocolInvariantError(`chunk indices are not contiguous at position ${position}`, {
          position,
          index: entry.index,
        });
      }
    });

    return ordered.map((entry) => entry.identifier);
  }
}
