/**
 * Content identifiers: SHA-256 digest plus byte length.
 */

import { createHash } from 'node:crypto';
import { ProtocolInvariantError } from '../errors/index.js';

/**
 * Identifier of a chunk's content, rendered as `<hex digest>-<length>`.
 */
export interface ContentIdentifier {
  /** Lowercase hex SHA-256 */
  readonly digest: string;
  /** Byte length */
  readonly size: number;
  /** Wire form */
  readonly value: string;
}

/**
 * Chunk reference as the probe and finalize endpoints expect it.
 */
export interface WireChunk {
  hash: string;
  size: string;
}

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;
const SIZE_PATTERN = /^(0|[1-9][0-9]*)$/;

/**
 * Hashes a chunk.
 */
export function createContentIdentifier(bytes: Uint8Array): ContentIdentifier {
  const digest = createHash('sha256').update(bytes).digest('hex');
  return {
    digest,
    size: bytes.byteLength,
    value: `${digest}-${bytes.byteLength}`,
  };
}

/**
 * Splits an identifier back into digest and size.
 * @throws ProtocolInvariantError if the value is not a well-formed identifier
 */
export function parseContentIdentifier(value: string): ContentIdentifier {
  const separator = value.indexOf('-');
  if (separator === -1) {
    throw new ProtocolInvariantError(`content identifier has no separator: ${value}`);
  }

  const digest = value.slice(0, separator);
  const sizeText = value.slice(separator + 1);

  if (!DIGEST_PATTERN.test(digest)) {
    throw new ProtocolInvariantError(`content identifier digest is not SHA-256 hex: ${value}`);
  }
  if (!SIZE_PATTERN.test(sizeText)) {
    throw new ProtocolInvariantError(`content identifier size is not a decimal length: ${value}`);
  }

  const size = Number(sizeText);
  if (!Number.isSafeInteger(size)) {
    throw new ProtocolInvariantError(`content identifier size out of range: ${value}`);
  }

  return { digest, size, value };
}

export function toWireChunk(identifier: ContentIdentifier): WireChunk {
  return {
    hash: identifier.digest,
    size: String(identifier.size),
  };
}

/**
 * Identifiers sorted by chunk index, one per chunk.
 */
export type OrderedIdentifierList = readonly ContentIdentifier[];
