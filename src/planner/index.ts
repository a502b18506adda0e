/**
 * Chunk geometry for a file of known size.
 */

import { ConfigurationError } from '../errors/index.js';

const MEGABYTE = 1024 * 1024;

/**
 * Chunk size tiers, keyed by the number of 10000 MB groups in the file.
 */
export const CHUNK_SIZE_TIERS: ReadonlyArray<{ belowGroups: number; chunkSize: number }> = [
  { belowGroups: 5, chunkSize: 5 * MEGABYTE },
  { belowGroups: 50, chunkSize: 50 * MEGABYTE },
  { belowGroups: 100, chunkSize: 100 * MEGABYTE },
];

export const MAX_CHUNK_SIZE = 210 * MEGABYTE;

/**
 * Byte range of one chunk.
 */
export interface ChunkRange {
  /** 0-based position in file order */
  index: number;
  /** Byte offset in the file */
  offset: number;
  /** Byte length */
  length: number;
}

function assertByteCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function assertChunkSize(chunkSize: number): void {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }
}

/**
 * Picks the chunk size for a file.
 */
export function computeChunkSize(sizeBytes: number): number {
  assertByteCount('File size', sizeBytes);

  const sizeMB = sizeBytes / MEGABYTE;
  const groups = Math.ceil(sizeMB / 10000);

  for (const tier of CHUNK_SIZE_TIERS) {
    if (groups < tier.belowGroups) {
      return tier.chunkSize;
    }
  }
  return MAX_CHUNK_SIZE;
}

/**
 * Upper-bound estimate of the number of chunks, used for progress display.
 * Overcounts by one when the size is an exact multiple of the chunk size.
 */
export function estimateChunkCount(sizeBytes: number, chunkSize: number): number {
  assertByteCount('File size', sizeBytes);
  assertChunkSize(chunkSize);
  return Math.floor(sizeBytes / chunkSize) + 1;
}

/**
 * Lists the ranges a sequential reader produces: full chunks, then a short
 * tail if any. An empty file has a single zero-length chunk.
 *
 * Public helper for callers that want the exact layout up front. The client
 * also compares it with what the dispatcher read to spot a file that changed
 * under the upload.
 */
export function planChunks(sizeBytes: number, chunkSize: number): ChunkRange[] {
  assertByteCount('File size', sizeBytes);
  assertChunkSize(chunkSize);

  if (sizeBytes === 0) {
    return [{ index: 0, offset: 0, length: 0 }];
  }

  const ranges: ChunkRange[] = [];
  for (let offset = 0, index = 0; offset < sizeBytes; offset += chunkSize, index++) {
    ranges.push({ index, offset, length: Math.min(chunkSize, sizeBytes - offset) });
  }
  return ranges;
}
