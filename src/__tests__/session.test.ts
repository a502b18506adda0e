/**
 * Tests for the upload session protocol.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { UploadSession } from '../session/index.js';
import { TransportClient } from '../transport/index.js';
import { RetryExecutor } from '../resilience/index.js';
import { BasicAuthProvider } from '../auth/index.js';
import { SecretString } from '../config/index.js';
import { createContentIdentifier } from '../content/index.js';
import { AuthenticationError, ProtocolInvariantError, RetriesExhaustedError } from '../errors/index.js';
import { MockTransferServer } from '../mocks/index.js';
import { BASE_URL, FAST_RETRY } from './helpers.js';

describe('UploadSession', () => {
  let server: MockTransferServer;

  function createSession(resourceKey = 'KEY-1', token = 'test-secret'): UploadSession {
    return new UploadSession({
      client: new TransportClient({
        baseUrl: BASE_URL,
        auth: new BasicAuthProvider({ username: 'test-user', token: new SecretString(token) }),
        transport: server,
        requestTimeoutMs: 1000,
        userAgent: 'chunked-transfer-test',
      }),
      retry: new RetryExecutor(FAST_RETRY),
      resourceKey,
    });
  }

  beforeEach(() => {
    server = new MockTransferServer();
  });

  it('should create a session', async () => {
    const session = createSession();

    await expect(session.create()).resolves.toBe('upload-1');
    expect(session.id).toBe('upload-1');
    expect(server.callsTo('create')[0].url.pathname).toBe('/api/upload/KEY-1/create');
  });

  it('should refuse operations before create', async () => {
    const session = createSession();
    const identifier = createContentIdentifier(Buffer.from('chunk'));

    await expect(session.probe(identifier)).rejects.toThrow(ProtocolInvariantError);
    await expect(session.upload(identifier, Buffer.from('chunk'), 1, 'a.bin')).rejects.toThrow(
      ProtocolInvariantError
    );
    await expect(session.finalize([identifier], 'a.bin', 'text/plain')).rejects.toThrow(ProtocolInvariantError);
    expect(server.calls).toHaveLength(0);
  });

  it('should refuse a second create', async () => {
    const session = createSession();
    await session.create();

    await expect(session.create()).rejects.toThrow(ProtocolInvariantError);
  });

  it('should probe, upload and probe again', async () => {
    const session = createSession();
    const bytes = Buffer.from('hello chunk');
    const identifier = createContentIdentifier(bytes);
    await session.create();

    await expect(session.probe(identifier)).resolves.toBe(false);
    await session.upload(identifier, bytes, 2, 'data.bin');
    await expect(session.probe(identifier)).resolves.toBe(true);

    expect(server.callsTo('probe')[0].json).toEqual({
      chunks: [{ hash: identifier.digest, size: '11' }],
    });
    const upload = server.callsTo('upload')[0];
    expect(upload.url.pathname).toBe(`/api/upload/KEY-1/chunk/${identifier.value}`);
    expect(upload.url.searchParams.get('uploadId')).toBe('upload-1');
    expect(upload.url.searchParams.get('partNumber')).toBe('2');
    expect(server.chunks.get(identifier.value)).toMatchObject({ partNumber: 2, fileName: 'data.bin' });
    expect(server.chunks.get(identifier.value)?.bytes.toString()).toBe('hello chunk');
  });

  it('should treat a missing probe entry as absent', async () => {
    server.intercept((call) =>
      call.operation === 'probe' ? { status: 200, body: { data: { results: {} } } } : undefined
    );
    const session = createSession();
    await session.create();

    await expect(session.probe(createContentIdentifier(Buffer.from('x')))).resolves.toBe(false);
  });

  it('should reject bytes that do not match the identifier', async () => {
    const session = createSession();
    await session.create();

    await expect(
      session.upload(createContentIdentifier(Buffer.from('abc')), Buffer.from('abcd'), 1, 'a.bin')
    ).rejects.toThrow(ProtocolInvariantError);
    expect(server.callsTo('upload')).toHaveLength(0);
  });

  it('should send the ordered manifest on finalize', async () => {
    const session = createSession();
    const first = Buffer.from('first');
    const second = Buffer.from('second');
    await session.create();
    for (const [index, bytes] of [first, second].entries()) {
      await session.upload(createContentIdentifier(bytes), bytes, index + 1, 'notes.txt');
    }

    await session.finalize(
      [createContentIdentifier(first), createContentIdentifier(second)],
      'notes.txt',
      'text/plain'
    );

    expect(server.finalized).toHaveLength(1);
    expect(server.finalized[0]).toEqual({
      uploadId: 'upload-1',
      resourceKey: 'KEY-1',
      name: 'notes.txt',
      mimeType: 'text/plain',
      chunks: [
        { hash: createContentIdentifier(first).digest, size: '5' },
        { hash: createContentIdentifier(second).digest, size: '6' },
      ],
    });
    expect(server.assemble(server.finalized[0]).toString()).toBe('firstsecond');
  });

  it('should encode the resource key in paths', async () => {
    const session = createSession('KEY 1/a');
    await session.create();

    expect(server.callsTo('create')[0].url.pathname).toBe('/api/upload/KEY%201%2Fa/create');
    expect(server.callsTo('create')[0].resourceKey).toBe('KEY 1/a');
  });

  it('should retry a transient failure', async () => {
    server.failTimes('probe', 502, 1);
    const session = createSession();
    await session.create();

    await expect(session.probe(createContentIdentifier(Buffer.from('x')))).resolves.toBe(false);
    expect(server.callsTo('probe')).toHaveLength(2);
  });

  it('should resend the same chunk bytes on every upload attempt', async () => {
    server.failTimes('upload', 503, 2);
    const pooled = Buffer.from('xxhello chunkyy');
    const bytes = pooled.subarray(2, 13);
    const identifier = createContentIdentifier(bytes);
    const session = createSession();
    await session.create();

    await session.upload(identifier, bytes, 1, 'data.bin');

    expect(server.callsTo('upload')).toHaveLength(3);
    expect(server.chunks.get(identifier.value)?.bytes.toString()).toBe('hello chunk');
  });

  it('should give up once retries run out', async () => {
    server.failTimes('finalize', 500, 10);
    const session = createSession();
    await session.create();

    await expect(session.finalize([], 'a.bin', 'text/plain')).rejects.toThrow(RetriesExhaustedError);
    expect(server.callsTo('finalize')).toHaveLength(FAST_RETRY.maxRetries + 1);
  });

  it('should fail fast on rejected credentials', async () => {
    server = new MockTransferServer({ token: 'other-secret' });
    const session = createSession();

    await expect(session.create()).rejects.toThrow(AuthenticationError);
    expect(server.callsTo('create')).toHaveLength(1);
  });
});
