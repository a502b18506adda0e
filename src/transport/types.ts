/**
 * HTTP transport type definitions for the transfer client.
 */

import type { TransferError } from '../errors/index.js';

/**
 * HTTP method
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Full URL including query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** JSON text or multipart form */
  body?: string | FormData;
  /** Absolute timeout for this attempt */
  timeoutMs: number;
  /** Cancels the request when the run is aborted */
  signal?: AbortSignal;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers, lower-cased names */
  headers: Record<string, string>;
  /** Response body as text */
  body: string;
}

/**
 * HTTP transport interface
 *
 * Implementations throw transfer errors for failures below HTTP (network,
 * timeout, abort) and return every HTTP response as-is, whatever its status.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Outcome buckets every remote call is sorted into.
 */
export type Classification = 'success' | 'fatal' | 'transient';

/**
 * Classified result of one remote call.
 */
export type TransportResult<T> =
  | { classification: 'success'; status: number; data: T }
  | { classification: 'fatal'; error: TransferError }
  | { classification: 'transient'; error: TransferError };
