/**
 * Digest engine: streaming SHA-256 over artifact bytes
 *
 * Memory use is bounded by the chunk size, not the artifact size. The
 * digest does not depend on the chunk size.
 */

import * as fs from 'node:fs';
import { sha256 } from '@noble/hashes/sha256';
import { keyToHex } from './keygen.js';
import { toIoError } from './errors.js';
import type { ArtifactDigest } from './types.js';

/** Default streaming chunk size (64 KiB) */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface DigestOptions {
  /** Bytes read per chunk */
  chunkSize?: number;
}

function resolveChunkSize(options?: DigestOptions): number {
  const chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Invalid chunk size: expected a positive integer, got ${chunkSize}`);
  }
  return chunkSize;
}

/**
 * Split an in-memory buffer into fixed-size chunks
 */
export function* chunk(bytes: Uint8Array, size: number): Generator<Uint8Array> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Invalid chunk size: expected a positive integer, got ${size}`);
  }
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}

/**
 * Hash a sequence of chunks
 */
export async function digest(
  chunks: Iterable<Uint8Array> | AsyncIterable<Uint8Array>
): Promise<ArtifactDigest> {
  const hash = sha256.create();
  for await (const piece of chunks) {
    hash.update(piece);
  }
  return keyToHex(hash.digest());
}

/**
 * Hash a sequence of chunks synchronously
 */
export function digestSync(chunks: Iterable<Uint8Array>): ArtifactDigest {
  const hash = sha256.create();
  for (const piece of chunks) {
    hash.update(piece);
  }
  return keyToHex(hash.digest());
}

/**
 * Stream a file through SHA-256
 *
 * @throws IoError if the file cannot be read to the end
 */
export async function digestFile(path: string, options?: DigestOptions): Promise<ArtifactDigest> {
  const chunkSize = resolveChunkSize(options);

  try {
    const stream = fs.createReadStream(path, { highWaterMark: chunkSize });
    return await digest(stream);
  } catch (error) {
    throw toIoError('read artifact', path, error);
  }
}

/**
 * Synchronous variant of digestFile reading into one reused buffer
 *
 * @throws IoError if the file cannot be read to the end
 */
export function digestFileSync(path: string, options?: DigestOptions): ArtifactDigest {
  const chunkSize = resolveChunkSize(options);
  const hash = sha256.create();
  const buffer = new Uint8Array(chunkSize);

  let fd: number | undefined;
  try {
    fd = fs.openSync(path, 'r');
    let bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
    while (bytesRead > 0) {
      hash.update(buffer.subarray(0, bytesRead));
      bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
    }
  } catch (error) {
    throw toIoError('read artifact', path, error);
  } finally {
    if (fd !== undefined) fs.closeSync(fd);
  }

  return keyToHex(hash.digest());
}
