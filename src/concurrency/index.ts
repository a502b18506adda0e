/**
 * Admission gate bounding the chunks in flight.
 */

import { ConfigurationError, ProtocolInvariantError, UploadAbortedError } from '../errors/index.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore. A released permit goes straight to the oldest waiter.
 */
export class AdmissionGate {
  private permits: number;
  private readonly capacity: number;
  private readonly waiting: Waiter[] = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
    this.capacity = permits;
  }

  /**
   * Takes a permit, waiting while none is free.
   * @throws UploadAbortedError if the signal fires while waiting
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new UploadAbortedError(signal.reason);
    }

    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiting.indexOf(waiter);
          if (index !== -1) {
            this.waiting.splice(index, 1);
          }
          reject(new UploadAbortedError(signal.reason));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiting.push(waiter);
    });
  }

  /**
   * Returns a permit.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      if (next.onAbort) {
        next.signal?.removeEventListener('abort', next.onAbort);
      }
      next.resolve();
      return;
    }

    if (this.permits >= this.capacity) {
      throw new ProtocolInvariantError('admission gate released more often than acquired');
    }
    this.permits++;
  }

  /** Free permits */
  get available(): number {
    return this.permits;
  }

  /** Callers blocked in acquire() */
  get pending(): number {
    return this.waiting.length;
  }
}
