/**
 * Fetch-based HTTP transport implementation.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import {
  NetworkError,
  TimeoutError,
  TransferError,
  UploadAbortedError,
} from '../errors/index.js';

/**
 * Fetch-based HTTP transport
 *
 * Each call gets its own AbortController: it fires on the per-attempt
 * timeout and on the caller's signal, whichever comes first.
 */
export class FetchTransport implements HttpTransport {
  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw new UploadAbortedError(request.signal.reason);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      const body = await response.text();

      return {
        status: response.status,
        headers,
        body,
      };
    } catch (error) {
      throw this.handleError(error, request, timedOut);
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Maps fetch failures onto transfer errors
   */
  private handleError(error: unknown, request: HttpRequest, timedOut: boolean): TransferError {
    if (request.signal?.aborted) {
      return new UploadAbortedError(request.signal.reason);
    }
    if (timedOut) {
      return new TimeoutError(request.timeoutMs);
    }
    if (error instanceof TransferError) {
      return error;
    }
    if (error instanceof Error) {
      return new NetworkError(error.message, error);
    }
    return new NetworkError(String(error));
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(): HttpTransport {
  return new FetchTransport();
}
