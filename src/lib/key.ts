/**
 * Key material provider
 * Resolves a KeySource into HMAC key bytes
 */

import * as fs from 'node:fs';
import { sha256 } from '@noble/hashes/sha256';
import { utf8ToBytes } from '@noble/hashes/utils';
import { KeyUnavailableError, toIoError } from './errors.js';
import type { KeyMaterial, KeySource } from './types.js';

/** Suffix bound into the simulated device key */
const IDENTITY_BINDING_SUFFIX = 'SecurityModule:HMAC';

const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d, 0x0b, 0x0c]);

/**
 * Copy of a byte buffer without ASCII whitespace at either end
 *
 * Always copies: `Buffer#slice` shares memory with its source, and the
 * source is wiped after trimming.
 */
function trimBytes(bytes: Uint8Array): Uint8Array {
  let start = 0;
  let end = bytes.length;
  while (start < end && WHITESPACE.has(bytes[start])) start++;
  while (end > start && WHITESPACE.has(bytes[end - 1])) end--;
  return new Uint8Array(bytes.subarray(start, end));
}

/**
 * Read a key file, trimming surrounding whitespace and newlines
 *
 * @throws IoError if the file cannot be read
 * @throws KeyUnavailableError if nothing is left after trimming
 */
function readKeyFile(path: string): KeyMaterial {
  let raw: Uint8Array;
  try {
    raw = fs.readFileSync(path);
  } catch (error) {
    throw toIoError('read key file', path, error);
  }

  const key = trimBytes(raw);
  raw.fill(0);
  if (key.length === 0) {
    throw new KeyUnavailableError(`Key file is empty: ${path}`, path);
  }
  return key;
}

/**
 * Simulated device-bound key: SHA-256("<deviceId>:<packageName>:SecurityModule:HMAC")
 *
 * NOT production strength. Anyone who knows both identifiers can recompute
 * the key, so it offers no secrecy. Real deployments obtain key material
 * from a hardware-backed keystore; this derivation stands in for one in
 * tests and demos.
 */
export function deriveIdentityKey(deviceId: string, packageName: string): KeyMaterial {
  if (!deviceId) {
    throw new KeyUnavailableError('Identity key requires a device id', 'deviceId');
  }
  if (!packageName) {
    throw new KeyUnavailableError('Identity key requires a package name', 'packageName');
  }
  return sha256(utf8ToBytes(`${deviceId}:${packageName}:${IDENTITY_BINDING_SUFFIX}`));
}

/**
 * Resolve a key source to key bytes
 *
 * @param source - The single selected key source
 * @param env - Environment to read `env` sources from
 * @throws KeyUnavailableError when the source yields no usable key
 * @throws IoError when a key file cannot be read
 */
export function deriveKey(
  source: KeySource,
  env: NodeJS.ProcessEnv = process.env
): KeyMaterial {
  switch (source.kind) {
    case 'literal':
      if (source.value.length === 0) {
        throw new KeyUnavailableError('Literal key is empty', 'literal');
      }
      return utf8ToBytes(source.value);

    case 'env': {
      // An empty value counts as unset: never sign with a zero-length key
      const value = env[source.name];
      if (!value) {
        throw new KeyUnavailableError(
          `Environment variable ${source.name} is empty or not set`,
          source.name
        );
      }
      return utf8ToBytes(value);
    }

    case 'file':
      return readKeyFile(source.path);

    case 'identity':
      return deriveIdentityKey(source.deviceId, source.packageName);
  }
}

/**
 * Label recorded in a structured signature to say where the key came from
 */
export function describeKeySource(source: KeySource): string {
  switch (source.kind) {
    case 'literal':
      return 'literal';
    case 'env':
      return 'env';
    case 'file':
      return 'file';
    case 'identity':
      return 'identity-simulated';
  }
}

/**
 * Custody of device-bound keys, as provided by a platform keystore
 */
export interface KeyStore {
  getOrCreateKey(alias: string): KeyMaterial;
}

/**
 * Test double for a hardware keystore, deriving keys from the device id
 * and the alias. Returns a fresh copy on every call.
 */
export class SimulatedKeyStore implements KeyStore {
  constructor(private readonly deviceId: string) {}

  getOrCreateKey(alias: string): KeyMaterial {
    return deriveIdentityKey(this.deviceId, alias);
  }
}
