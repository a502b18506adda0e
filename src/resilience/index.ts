/**
 * Retry with exponential backoff, driven by transport classification.
 */

import { DEFAULT_RETRY_CONFIG, type RetryConfig } from '../config/index.js';
import { RetriesExhaustedError, TransferError, UploadAbortedError } from '../errors/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import type { TransportResult } from '../transport/index.js';

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called before each retry */
  onRetry?: (attempt: number, error: TransferError, delayMs: number) => void;
  /** Called when retries are exhausted */
  onRetriesExhausted?: (error: TransferError, attempts: number) => void;
  /** Called on success */
  onSuccess?: (attempts: number) => void;
}

/**
 * Computes the backoff before retry number `attempt` (1-based).
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const exponentialDelay =
    config.initialBackoffMs * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxBackoffMs);

  const jitter = 1 + (random() - 0.5) * 2 * config.jitterFactor;
  return Math.max(0, Math.min(cappedDelay * jitter, config.maxBackoffMs));
}

/**
 * Sleeps, rejecting with {@link UploadAbortedError} if the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new UploadAbortedError(signal.reason));
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new UploadAbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry executor
 *
 * Fatal results are thrown straight away. Transient results are retried until
 * either `maxRetries` or `maxElapsedMs` runs out, whichever comes first.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly hooks: RetryHooks;
  private readonly random: () => number;

  constructor(config: RetryConfig = DEFAULT_RETRY_CONFIG, hooks: RetryHooks = {}, random: () => number = Math.random) {
    this.config = config;
    this.hooks = hooks;
    this.random = random;
  }

  /**
   * Executes an operation with retry logic.
   * @throws the fatal error, UploadAbortedError, or RetriesExhaustedError
   */
  async execute<T>(
    operation: (attempt: number) => Promise<TransportResult<T>>,
    signal?: AbortSignal
  ): Promise<T> {
    const startedAt = Date.now();

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new UploadAbortedError(signal.reason);
      }

      const result = await operation(attempt);

      if (result.classification === 'success') {
        this.hooks.onSuccess?.(attempt);
        return result.data;
      }

      if (result.classification === 'fatal') {
        throw result.error;
      }

      const delayMs = calculateBackoff(attempt, this.config, this.random);
      const elapsedMs = Date.now() - startedAt;

      if (attempt > this.config.maxRetries || elapsedMs + delayMs > this.config.maxElapsedMs) {
        this.hooks.onRetriesExhausted?.(result.error, attempt);
        throw new RetriesExhaustedError(attempt, result.error);
      }

      this.hooks.onRetry?.(attempt, result.error, delayMs);
      await sleep(delayMs, signal);
    }
  }
}

/**
 * Creates a retry executor that logs retries and counts them.
 */
export function createRetryExecutor(
  config?: Partial<RetryConfig>,
  observability: Observability = createNoopObservability()
): RetryExecutor {
  const { logger, metrics } = observability;

  return new RetryExecutor(
    { ...DEFAULT_RETRY_CONFIG, ...config },
    {
      onRetry: (attempt, error, delayMs) => {
        metrics.increment(MetricNames.RETRIES_TOTAL);
        logger.warn('Retrying request', {
          attempt,
          delayMs: Math.round(delayMs),
          error: error.message,
        });
      },
      onRetriesExhausted: (error, attempts) => {
        logger.error('Retries exhausted', {
          attempts,
          error: error.message,
        });
      },
    }
  );
}
