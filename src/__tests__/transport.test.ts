/**
 * Tests for the transport layer.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { FetchTransport, TransportClient, type HttpRequest, type HttpResponse, type HttpTransport } from '../transport/index.js';
import { BasicAuthProvider } from '../auth/index.js';
import { SecretString } from '../config/index.js';
import {
  AuthenticationError,
  NetworkError,
  ResponseDecodeError,
  TimeoutError,
  UnexpectedStatusError,
  UploadAbortedError,
} from '../errors/index.js';
import { InMemoryMetrics, MetricNames, NoopLogger } from '../observability/index.js';
import { BASE_URL } from './helpers.js';

const UploadIdSchema = z.object({ uploadId: z.string() });

class StubTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly responder: (request: HttpRequest) => Promise<HttpResponse>) {}

  send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.responder(request);
  }
}

function respond(status: number, body: string): () => Promise<HttpResponse> {
  return async () => ({ status, headers: {}, body });
}

function createClient(transport: HttpTransport, metrics = new InMemoryMetrics()): TransportClient {
  return new TransportClient({
    baseUrl: BASE_URL,
    auth: new BasicAuthProvider({ username: 'test-user', token: new SecretString('test-secret') }),
    transport,
    requestTimeoutMs: 1234,
    userAgent: 'chunked-transfer-test',
    observability: { logger: new NoopLogger(), metrics },
  });
}

describe('TransportClient', () => {
  it('should send an authenticated JSON request', async () => {
    const transport = new StubTransport(respond(200, '{}'));
    const client = createClient(transport);

    await client.call({
      operation: 'probe',
      path: '/api/upload/KEY-1/chunk/probe',
      query: { uploadId: 'upload-1' },
      json: { chunks: [] },
      expectedStatus: [200],
    });

    expect(transport.requests).toHaveLength(1);
    const [request] = transport.requests;
    expect(request.method).toBe('POST');
    expect(request.url).toBe(`${BASE_URL}/api/upload/KEY-1/chunk/probe?uploadId=upload-1`);
    expect(request.headers.Authorization).toBe(
      `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`
    );
    expect(request.headers['Content-Type']).toBe('application/json');
    expect(request.headers['User-Agent']).toBe('chunked-transfer-test');
    expect(request.body).toBe('{"chunks":[]}');
    expect(request.timeoutMs).toBe(1234);
  });

  it('should decode a successful response', async () => {
    const metrics = new InMemoryMetrics();
    const client = createClient(new StubTransport(respond(201, '{"uploadId":"upload-7"}')), metrics);

    const result = await client.callJson(
      { operation: 'create', path: '/api/upload/KEY-1/create', expectedStatus: [201] },
      UploadIdSchema
    );

    expect(result).toEqual({ classification: 'success', status: 201, data: { uploadId: 'upload-7' } });
    expect(
      metrics.getCounter(MetricNames.REQUESTS_TOTAL, { operation: 'create', classification: 'success' })
    ).toBe(1);
    expect(metrics.getTiming(MetricNames.REQUEST_LATENCY, { operation: 'create' }).count).toBe(1);
  });

  it('should classify 401 as fatal', async () => {
    const client = createClient(new StubTransport(respond(401, '')));

    const result = await client.call({ operation: 'upload', path: '/x', expectedStatus: [200, 201] });

    expect(result.classification).toBe('fatal');
    if (result.classification !== 'success') {
      expect(result.error).toBeInstanceOf(AuthenticationError);
      expect(result.error.message).toBe('upload: authentication failed');
    }
  });

  it('should classify an unexpected status as transient', async () => {
    const client = createClient(new StubTransport(respond(200, '{}')));

    const result = await client.call({ operation: 'create', path: '/x', expectedStatus: [201] });

    expect(result.classification).toBe('transient');
    if (result.classification !== 'success') {
      expect(result.error).toBeInstanceOf(UnexpectedStatusError);
      expect(result.error.statusCode).toBe(200);
    }
  });

  it('should classify an undecodable body as transient', async () => {
    const notJson = createClient(new StubTransport(respond(201, '<html>')));
    const wrongShape = createClient(new StubTransport(respond(201, '{"id":"upload-1"}')));
    const call = { operation: 'create' as const, path: '/x', expectedStatus: [201] };

    const first = await notJson.callJson(call, UploadIdSchema);
    const second = await wrongShape.callJson(call, UploadIdSchema);

    for (const result of [first, second]) {
      expect(result.classification).toBe('transient');
      if (result.classification !== 'success') {
        expect(result.error).toBeInstanceOf(ResponseDecodeError);
      }
    }
  });

  it('should classify transport failures', async () => {
    const network = createClient(
      new StubTransport(async () => {
        throw new NetworkError('connection reset');
      })
    );
    const unknown = createClient(
      new StubTransport(async () => {
        throw new Error('socket hang up');
      })
    );
    const aborted = createClient(
      new StubTransport(async () => {
        throw new UploadAbortedError();
      })
    );
    const call = { operation: 'probe' as const, path: '/x', expectedStatus: [200] };

    expect((await network.call(call)).classification).toBe('transient');
    expect((await unknown.call(call)).classification).toBe('transient');
    expect((await aborted.call(call)).classification).toBe('fatal');
  });

  it('should not send when already aborted', async () => {
    const transport = new StubTransport(respond(200, '{}'));
    const client = createClient(transport);
    const controller = new AbortController();
    controller.abort();

    const result = await client.call({
      operation: 'probe',
      path: '/x',
      expectedStatus: [200],
      signal: controller.signal,
    });

    expect(result.classification).toBe('fatal');
    expect(transport.requests).toHaveLength(0);
  });
});

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const request: HttpRequest = {
    method: 'POST',
    url: `${BASE_URL}/api/upload/KEY-1/create`,
    headers: {},
    timeoutMs: 50,
  };

  it('should return status, lower-cased headers and body', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('{"uploadId":"upload-1"}', { status: 201, headers: { 'X-Request-Id': 'r-1' } }))
    );

    const response = await new FetchTransport().send(request);

    expect(response.status).toBe(201);
    expect(response.headers['x-request-id']).toBe('r-1');
    expect(response.body).toBe('{"uploadId":"upload-1"}');
  });

  it('should map fetch failures to network errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(new FetchTransport().send(request)).rejects.toThrow(NetworkError);
    await expect(new FetchTransport().send(request)).rejects.toThrow('Network error: fetch failed');
  });

  function hangingFetch(): (input: string | URL | Request, init?: RequestInit) => Promise<Response> {
    return (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
  }

  it('should time out a hanging request', async () => {
    vi.stubGlobal('fetch', vi.fn(hangingFetch()));

    await expect(new FetchTransport().send(request)).rejects.toThrow(TimeoutError);
  });

  it('should report a caller abort as an aborted upload', async () => {
    vi.stubGlobal('fetch', vi.fn(hangingFetch()));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);

    await expect(
      new FetchTransport().send({ ...request, timeoutMs: 10000, signal: controller.signal })
    ).rejects.toThrow(UploadAbortedError);
  });
});
