/**
 * In-process transfer service for tests.
 */

import { createHash } from 'node:crypto';
import type { TransferOperation } from '../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';
import type { WireChunk } from '../content/index.js';
import { sleep } from '../resilience/index.js';

/**
 * Mock response
 */
export interface MockReply {
  status: number;
  body?: unknown;
}

/**
 * A request as seen by the mock server
 */
export interface MockCall {
  operation: TransferOperation;
  resourceKey: string;
  url: URL;
  request: HttpRequest;
  /** Parsed JSON body, for probe and finalize */
  json?: unknown;
}

/**
 * Returns a reply to short-circuit the default handling, or undefined to pass.
 */
export type MockInterceptor = (call: MockCall) => MockReply | undefined;

/**
 * Finalize payload the server received
 */
export interface FinalizedFile {
  uploadId: string;
  resourceKey: string;
  name: string;
  mimeType: string;
  chunks: WireChunk[];
}

/**
 * Uploaded chunk
 */
export interface StoredChunk {
  identifier: string;
  bytes: Buffer;
  partNumber: number;
  fileName: string;
}

export interface MockTransferServerOptions {
  username?: string;
  token?: string;
}

const ROUTE = /^\/api\/upload\/([^/]+)\/(create|chunk\/probe|chunk\/([^/]+)|file\/chunked)$/;

interface FinalizeBody {
  chunks: WireChunk[];
  name: string;
  mimeType: string;
}

function isWireChunk(value: unknown): value is WireChunk {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hash' in value &&
    'size' in value &&
    typeof value.hash === 'string' &&
    typeof value.size === 'string'
  );
}

function readChunkList(json: unknown): WireChunk[] | undefined {
  if (typeof json !== 'object' || json === null || !('chunks' in json) || !Array.isArray(json.chunks)) {
    return undefined;
  }
  const chunks: unknown[] = json.chunks;
  return chunks.every(isWireChunk) ? chunks.filter(isWireChunk) : undefined;
}

function readFinalizeBody(json: unknown): FinalizeBody | undefined {
  const chunks = readChunkList(json);
  if (!chunks || typeof json !== 'object' || json === null || !('name' in json) || !('mimeType' in json)) {
    return undefined;
  }
  if (typeof json.name !== 'string' || typeof json.mimeType !== 'string') {
    return undefined;
  }
  return { chunks, name: json.name, mimeType: json.mimeType };
}

/**
 * Mock transfer service implementing the create/probe/upload/finalize protocol.
 *
 * Chunks are stored by identifier across sessions, so a second upload of the
 * same file probes every chunk as present.
 */
export class MockTransferServer implements HttpTransport {
  private readonly expectedAuthorization: string;
  private readonly interceptors: MockInterceptor[] = [];
  private delayFor: (call: MockCall) => number = () => 0;
  private nextUploadId = 1;
  private readonly sessions = new Map<string, string>();

  /** Every request received, in arrival order */
  readonly calls: MockCall[] = [];
  /** Uploaded chunks by identifier */
  readonly chunks = new Map<string, StoredChunk>();
  /** Finalize payloads accepted */
  readonly finalized: FinalizedFile[] = [];

  constructor(options: MockTransferServerOptions = {}) {
    const username = options.username ?? 'test-user';
    const token = options.token ?? 'test-secret';
    this.expectedAuthorization = `Basic ${Buffer.from(`${username}:${token}`).toString('base64')}`;
  }

  /**
   * Adds an interceptor; the first one returning a reply wins
   */
  intercept(interceptor: MockInterceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  /**
   * Answers the next `times` calls of an operation with `status`
   */
  failTimes(operation: TransferOperation, status: number, times: number): this {
    let remaining = times;
    return this.intercept((call) => {
      if (call.operation !== operation || remaining <= 0) {
        return undefined;
      }
      remaining--;
      return { status, body: { message: `injected ${status}` } };
    });
  }

  /**
   * Delays responses; the delay honours the request's abort signal
   */
  setDelay(delayFor: (call: MockCall) => number): this {
    this.delayFor = delayFor;
    return this;
  }

  /**
   * Calls made for one operation
   */
  callsTo(operation: TransferOperation): MockCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  /**
   * Stores a chunk as if an earlier upload had sent it
   */
  seedChunk(bytes: Buffer): string {
    const identifier = `${createHash('sha256').update(bytes).digest('hex')}-${bytes.byteLength}`;
    this.chunks.set(identifier, { identifier, bytes, partNumber: 0, fileName: '' });
    return identifier;
  }

  /**
   * Reassembles a finalized file from its stored chunks
   */
  assemble(file: FinalizedFile): Buffer {
    return Buffer.concat(
      file.chunks.map((chunk) => {
        const stored = this.chunks.get(`${chunk.hash}-${chunk.size}`);
        if (!stored) {
          throw new Error(`chunk ${chunk.hash} was never uploaded`);
        }
        return stored.bytes;
      })
    );
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(request.url);
    const match = ROUTE.exec(url.pathname);
    if (!match) {
      return this.reply({ status: 404, body: { message: `no route for ${url.pathname}` } });
    }

    const resourceKey = decodeURIComponent(match[1]);
    const route = match[2];
    const operation: TransferOperation =
      route === 'create' ? 'create' : route === 'chunk/probe' ? 'probe' : route === 'file/chunked' ? 'finalize' : 'upload';
    const json: unknown = typeof request.body === 'string' ? JSON.parse(request.body) : undefined;

    const call: MockCall = { operation, resourceKey, url, request, json };
    this.calls.push(call);

    const delayMs = this.delayFor(call);
    if (delayMs > 0) {
      await sleep(delayMs, request.signal);
    }

    if (request.headers.Authorization !== this.expectedAuthorization) {
      return this.reply({ status: 401, body: { message: 'Unauthorized' } });
    }

    for (const interceptor of this.interceptors) {
      const reply = interceptor(call);
      if (reply) {
        return this.reply(reply);
      }
    }

    switch (operation) {
      case 'create':
        return this.reply(this.handleCreate(resourceKey));
      case 'probe':
        return this.reply(this.handleProbe(call));
      case 'upload':
        return this.reply(await this.handleUpload(call, decodeURIComponent(match[3] ?? '')));
      case 'finalize':
        return this.reply(this.handleFinalize(call));
    }
  }

  private handleCreate(resourceKey: string): MockReply {
    const uploadId = `upload-${this.nextUploadId++}`;
    this.sessions.set(uploadId, resourceKey);
    return { status: 201, body: { uploadId } };
  }

  private handleProbe(call: MockCall): MockReply {
    if (!this.knownSession(call)) {
      return { status: 404, body: { message: 'unknown upload' } };
    }
    const chunks = readChunkList(call.json);
    if (!chunks) {
      return { status: 400, body: { message: 'malformed probe' } };
    }

    const results: Record<string, { exists: boolean }> = {};
    for (const chunk of chunks) {
      results[`sha256-${chunk.hash}`] = { exists: this.chunks.has(`${chunk.hash}-${chunk.size}`) };
    }
    return { status: 200, body: { data: { results } } };
  }

  private async handleUpload(call: MockCall, identifier: string): Promise<MockReply> {
    if (!this.knownSession(call)) {
      return { status: 404, body: { message: 'unknown upload' } };
    }
    const form = call.request.body;
    if (!(form instanceof FormData)) {
      return { status: 400, body: { message: 'expected multipart body' } };
    }
    const entry = form.get('chunk');
    if (entry === null || typeof entry === 'string') {
      return { status: 400, body: { message: 'missing chunk field' } };
    }

    const bytes = Buffer.from(await entry.arrayBuffer());
    const actual = `${createHash('sha256').update(bytes).digest('hex')}-${bytes.byteLength}`;
    if (actual !== identifier) {
      return { status: 400, body: { message: 'chunk does not match its identifier' } };
    }

    this.chunks.set(identifier, {
      identifier,
      bytes,
      partNumber: Number(call.url.searchParams.get('partNumber')),
      fileName: entry.name,
    });
    return { status: 201, body: {} };
  }

  private handleFinalize(call: MockCall): MockReply {
    const uploadId = call.url.searchParams.get('uploadId');
    if (uploadId === null || !this.knownSession(call)) {
      return { status: 404, body: { message: 'unknown upload' } };
    }
    const body = readFinalizeBody(call.json);
    if (!body) {
      return { status: 400, body: { message: 'malformed finalize' } };
    }
    if (body.chunks.some((chunk) => !this.chunks.has(`${chunk.hash}-${chunk.size}`))) {
      return { status: 400, body: { message: 'finalize references a missing chunk' } };
    }

    this.finalized.push({ uploadId, resourceKey: call.resourceKey, ...body });
    return { status: 201, body: {} };
  }

  private knownSession(call: MockCall): boolean {
    const uploadId = call.url.searchParams.get('uploadId');
    return uploadId !== null && this.sessions.get(uploadId) === call.resourceKey;
  }

  private reply(reply: MockReply): HttpResponse {
    return {
      status: reply.status,
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(reply.body ?? {}),
    };
  }
}
