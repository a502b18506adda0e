/**
 * Authenticated request/response primitive for the transfer protocol.
 *
 * Every call is sorted into success, fatal or transient. Nothing here throws:
 * retry decisions belong to the {@link RetryExecutor} that drives it.
 */

import { z } from 'zod';
import type { AuthProvider } from '../auth/index.js';
import {
  AuthenticationError,
  ResponseDecodeError,
  TransferError,
  UnexpectedStatusError,
  UploadAbortedError,
  toTransferError,
  type TransferOperation,
} from '../errors/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';
import type { HttpRequest, HttpResponse, HttpTransport, TransportResult } from './types.js';

/**
 * Transport client options
 */
export interface TransportClientOptions {
  /** Service base URL, without trailing slash */
  baseUrl: string;
  /** Supplies the Authorization header */
  auth: AuthProvider;
  /** Low-level HTTP transport */
  transport: HttpTransport;
  /** Per-attempt timeout */
  requestTimeoutMs: number;
  /** User agent string */
  userAgent: string;
  observability?: Observability;
}

/**
 * One remote call
 */
export interface TransportCall {
  /** Protocol operation, used for errors and metrics */
  operation: TransferOperation;
  /** Path below the base URL, already encoded */
  path: string;
  /** Query parameters */
  query?: Record<string, string | number>;
  /** JSON body */
  json?: unknown;
  /** Multipart body */
  form?: FormData;
  /** Status codes that count as success */
  expectedStatus: readonly number[];
  signal?: AbortSignal;
}

type Exchange =
  | { kind: 'response'; response: HttpResponse }
  | { kind: 'failed'; result: TransportResult<never> };

/**
 * Transport client
 */
export class TransportClient {
  private readonly baseUrl: string;
  private readonly auth: AuthProvider;
  private readonly transport: HttpTransport;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly observability: Observability;

  constructor(options: TransportClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.auth = options.auth;
    this.transport = options.transport;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.userAgent = options.userAgent;
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Sends a call whose response body is ignored.
   */
  async call(call: TransportCall): Promise<TransportResult<void>> {
    const exchange = await this.exchange(call);
    if (exchange.kind === 'failed') {
      return exchange.result;
    }
    return { classification: 'success', status: exchange.response.status, data: undefined };
  }

  /**
   * Sends a call and decodes its JSON body with the given schema.
   */
  async callJson<T>(call: TransportCall, schema: z.ZodType<T>): Promise<TransportResult<T>> {
    const exchange = await this.exchange(call);
    if (exchange.kind === 'failed') {
      return exchange.result;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(exchange.response.body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.transient(call.operation, new ResponseDecodeError(call.operation, reason));
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return this.transient(call.operation, new ResponseDecodeError(call.operation, reason));
    }

    return { classification: 'success', status: exchange.response.status, data: parsed.data };
  }

  /**
   * Builds a full URL from a path and query parameters
   */
  buildUrl(path: string, query?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async exchange(call: TransportCall): Promise<Exchange> {
    const { logger, metrics } = this.observability;

    if (call.signal?.aborted) {
      return { kind: 'failed', result: { classification: 'fatal', error: new UploadAbortedError(call.signal.reason) } };
    }

    const request = await this.buildRequest(call);
    const startTime = Date.now();

    logger.debug('Sending request', { operation: call.operation, url: request.url });

    let response: HttpResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      const transferError = toTransferError(error);
      metrics.timing(MetricNames.REQUEST_LATENCY, Date.now() - startTime, { operation: call.operation });
      if (!transferError.retryable) {
        metrics.increment(MetricNames.REQUESTS_TOTAL, 1, { operation: call.operation, classification: 'fatal' });
        return { kind: 'failed', result: { classification: 'fatal', error: transferError } };
      }
      return { kind: 'failed', result: this.transient(call.operation, transferError) };
    }

    metrics.timing(MetricNames.REQUEST_LATENCY, Date.now() - startTime, { operation: call.operation });
    logger.debug('Received response', { operation: call.operation, status: response.status });

    if (response.status === 401) {
      metrics.increment(MetricNames.REQUESTS_TOTAL, 1, { operation: call.operation, classification: 'fatal' });
      return {
        kind: 'failed',
        result: {
          classification: 'fatal',
          error: new AuthenticationError(`${call.operation}: authentication failed`),
        },
      };
    }

    if (!call.expectedStatus.includes(response.status)) {
      return {
        kind: 'failed',
        result: this.transient(
          call.operation,
          new UnexpectedStatusError(call.operation, response.status, response.body)
        ),
      };
    }

    metrics.increment(MetricNames.REQUESTS_TOTAL, 1, { operation: call.operation, classification: 'success' });
    return { kind: 'response', response };
  }

  private async buildRequest(call: TransportCall): Promise<HttpRequest> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
      ...(await this.auth.getAuthHeaders()),
    };

    let body: string | FormData | undefined;
    if (call.form) {
      // fetch sets the multipart boundary itself
      body = call.form;
    } else if (call.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(call.json);
    }

    return {
      method: 'POST',
      url: this.buildUrl(call.path, call.query),
      headers,
      body,
      timeoutMs: this.requestTimeoutMs,
      signal: call.signal,
    };
  }

  private transient(operation: TransferOperation, error: TransferError): TransportResult<never> {
    this.observability.metrics.increment(MetricNames.REQUESTS_TOTAL, 1, {
      operation,
      classification: 'transient',
    });
    return { classification: 'transient', error };
  }
}
