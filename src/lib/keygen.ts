/**
 * Key generation and hex helpers for HMAC keys
 */

import { randomBytes } from '@noble/hashes/utils';
import type { KeyMaterial } from './types.js';

/** HMAC-SHA256 key length matching the hash output size */
export const DEFAULT_KEY_LENGTH = 32;

/** Number of key bytes shown by previewKey */
const PREVIEW_BYTES = 8;

/**
 * Generate a fresh random HMAC key
 *
 * @param length - Key length in bytes (at least 16)
 */
export function keygen(length = DEFAULT_KEY_LENGTH): KeyMaterial {
  if (!Number.isInteger(length) || length < 16) {
    throw new Error(`Invalid key length: expected an integer of at least 16 bytes, got ${length}`);
  }
  return randomBytes(length);
}

/**
 * Encode bytes as lowercase hex
 */
export function keyToHex(key: Uint8Array): string {
  return Array.from(key)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Decode a hex string to bytes
 *
 * @param hex - Hex-encoded string, optionally 0x-prefixed
 */
export function hexToKey(hex: string): Uint8Array {
  const cleanHex = hex.replace(/^0x/, '').replace(/\s/g, '');

  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string: odd number of characters');
  }

  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < cleanHex.length; i += 2) {
    const pair = cleanHex.slice(i, i + 2);
    if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
      throw new Error(`Invalid hex character at position ${i}`);
    }
    bytes[i / 2] = parseInt(pair, 16);
  }

  return bytes;
}

/**
 * Truncated key for diagnostics. Never log a key any other way.
 */
export function previewKey(key: KeyMaterial): string {
  return `${keyToHex(key.subarray(0, PREVIEW_BYTES))}...`;
}

/**
 * Overwrite key bytes once the invocation is done with them
 */
export function wipeKey(key: KeyMaterial): void {
  key.fill(0);
}
