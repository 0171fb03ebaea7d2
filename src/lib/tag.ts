/**
 * Integrity tag engine: HMAC-SHA256 over a profile-defined message
 *
 * The profile is fixed per artifact type. Signing a package over its digest
 * and verifying it over raw bytes fails exactly like tampering would, so the
 * profile is never inferred from the artifact's content.
 */

import * as fs from 'node:fs/promises';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { utf8ToBytes } from '@noble/hashes/utils';
import canonicalize from 'canonicalize';
import { digestFile, type DigestOptions } from './digest.js';
import { FormatError, toIoError } from './errors.js';
import { keyToHex } from './keygen.js';
import type {
  ArtifactDigest,
  ArtifactType,
  IntegrityTag,
  KeyMaterial,
  SigningProfile,
} from './types.js';

/**
 * Signing profile of each artifact type
 */
export const ARTIFACT_PROFILES: Readonly<Record<ArtifactType, SigningProfile>> = {
  package: 'digest-then-mac',
  config: 'direct-mac',
  'config-json': 'canonical-json-mac',
};

export const ARTIFACT_TYPES: readonly ArtifactType[] = ['package', 'config', 'config-json'];

export function isArtifactType(value: string): value is ArtifactType {
  return ARTIFACT_TYPES.some((type) => type === value);
}

export function profileFor(type: ArtifactType): SigningProfile {
  return ARTIFACT_PROFILES[type];
}

/**
 * HMAC-SHA256(key, message) as lowercase hex
 */
export function computeTag(message: Uint8Array, key: KeyMaterial): IntegrityTag {
  return keyToHex(hmac(sha256, key, message));
}

/**
 * Message for the digest-then-mac profile: the hex digest as UTF-8 text
 */
export function digestMessage(digest: ArtifactDigest): Uint8Array {
  return utf8ToBytes(digest);
}

/**
 * Message for the canonical-json-mac profile: JCS (RFC 8785) of the parsed JSON
 *
 * @param raw - JSON document bytes
 * @param path - Source path, for error messages
 * @throws FormatError if the bytes are not a JSON document
 */
export function canonicalJsonMessage(raw: Uint8Array, path?: string): Uint8Array {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(raw));
  } catch (error) {
    const where = path ? ` in ${path}` : '';
    throw new FormatError(
      `Invalid JSON${where}: ${error instanceof Error ? error.message : error}`,
      path
    );
  }

  const canonical = canonicalize(parsed);
  if (!canonical) {
    throw new FormatError('Canonicalization failed', path);
  }
  return utf8ToBytes(canonical);
}

export interface ProfileMessage {
  /** Bytes fed into the HMAC */
  message: Uint8Array;
  /** SHA-256 of the raw artifact bytes */
  digest: ArtifactDigest;
}

/**
 * Read an artifact and build the message its profile signs
 *
 * digest-then-mac streams the file once. The other profiles read the whole
 * file once and hash the buffer in memory.
 *
 * @throws IoError if the artifact cannot be read
 * @throws FormatError if a canonical-json artifact is not valid JSON
 */
export async function buildMessage(
  profile: SigningProfile,
  artifactPath: string,
  options?: DigestOptions
): Promise<ProfileMessage> {
  if (profile === 'digest-then-mac') {
    const digest = await digestFile(artifactPath, options);
    return { message: digestMessage(digest), digest };
  }

  let raw: Uint8Array;
  try {
    raw = await fs.readFile(artifactPath);
  } catch (error) {
    throw toIoError('read artifact', artifactPath, error);
  }

  const digest = keyToHex(sha256(raw));
  switch (profile) {
    case 'direct-mac':
      return { message: raw, digest };
    case 'canonical-json-mac':
      return { message: canonicalJsonMessage(raw, artifactPath), digest };
  }
}
