/**
 * Shared fixtures for tests.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TransferConfigBuilder, type RetryConfig, type TransferConfig } from '../config/index.js';
import type { ChunkSource } from '../dispatcher/index.js';

export const BASE_URL = 'https://transfer.example.test';

export const MB = 1024 * 1024;

export const FAST_RETRY: RetryConfig = {
  maxRetries: 3,
  maxElapsedMs: 60000,
  initialBackoffMs: 1,
  maxBackoffMs: 5,
  backoffMultiplier: 2,
  jitterFactor: 0,
};

export function testConfig(overrides: Partial<RetryConfig> = {}): TransferConfig {
  return new TransferConfigBuilder()
    .withBaseUrl(BASE_URL)
    .withCredentials('test-user', 'test-secret')
    .withRetryConfig({ ...FAST_RETRY, ...overrides })
    .build();
}

/**
 * Buffer whose chunk `i` (of `chunkSize` bytes) is filled with byte `i + 1`.
 */
export function patternedBuffer(size: number, chunkSize: number): Buffer {
  const data = Buffer.alloc(size);
  for (let offset = 0, index = 0; offset < size; offset += chunkSize, index++) {
    data.fill(index + 1, offset, Math.min(offset + chunkSize, size));
  }
  return data;
}

export function bufferSource(data: Buffer): ChunkSource {
  return {
    read: async (buffer, offset, length, position) => {
      if (position >= data.length) {
        return { bytesRead: 0 };
      }
      const end = Math.min(position + length, data.length);
      return { bytesRead: data.copy(buffer, offset, position, end) };
    },
  };
}

/**
 * Temporary directory removed by `cleanup()`.
 */
export async function createWorkspace(): Promise<{
  writeFile: (name: string, data: Buffer) => Promise<string>;
  path: (name: string) => string;
  cleanup: () => Promise<void>;
}> {
  const dir = await mkdtemp(join(tmpdir(), 'chunked-transfer-'));
  return {
    writeFile: async (name, data) => {
      const filePath = join(dir, name);
      await writeFile(filePath, data);
      return filePath;
    },
    path: (name) => join(dir, name),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
