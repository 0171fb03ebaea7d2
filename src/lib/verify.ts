/**
 * Verification: recompute a tag and compare it in constant time
 *
 * A mismatch is a normal outcome ('tamper'), not an error. Only unreadable
 * files, unusable keys and malformed signatures throw.
 */

import { timingSafeEqual } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { FormatError, toIoError } from './errors.js';
import { hexToKey } from './keygen.js';
import { parseHex64, readSignature, variantForPath } from './signature.js';
import { buildMessage, computeTag, profileFor } from './tag.js';
import type { DigestOptions } from './digest.js';
import type {
  ArtifactType,
  IntegrityTag,
  KeyMaterial,
  SignatureVariant,
  VerifyOutcome,
  VerifyResult,
} from './types.js';

/**
 * Compare two hex strings without short-circuiting on the first difference
 *
 * Strings of different length compare unequal immediately; the length of a
 * tag is public.
 */
export function constantTimeEqualHex(a: string, b: string): boolean {
  if (a.length !== b.length || a.length % 2 !== 0) {
    return false;
  }
  let left: Uint8Array;
  let right: Uint8Array;
  try {
    left = hexToKey(a);
    right = hexToKey(b);
  } catch {
    // Not hex: cannot be an equal tag
    return false;
  }
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Recompute HMAC-SHA256(key, message) and compare it with the expected tag
 *
 * The message must be built with the same profile used at signing time.
 *
 * @throws FormatError if expectedTag is not 64 hex characters
 */
export function verifyTag(
  message: Uint8Array,
  key: KeyMaterial,
  expectedTag: IntegrityTag
): VerifyOutcome {
  const expected = parseHex64(expectedTag, 'expected tag');
  const actual = computeTag(message, key);
  return constantTimeEqualHex(actual, expected) ? 'match' : 'tamper';
}

export interface VerifyArtifactOptions extends DigestOptions {
  /** Signature variant; inferred from the signature path when omitted */
  variant?: SignatureVariant;
}

/**
 * Verify an artifact against its signature file
 *
 * @param artifactPath - Artifact to check
 * @param type - Artifact type; fixes the signing profile
 * @param key - Key material
 * @param signaturePath - Bare or structured signature file
 * @param options - Variant and chunk size
 */
export async function verifyArtifact(
  artifactPath: string,
  type: ArtifactType,
  key: KeyMaterial,
  signaturePath: string,
  options?: VerifyArtifactOptions
): Promise<VerifyResult> {
  const variant = options?.variant ?? variantForPath(signaturePath);
  const signature = await readSignature(signaturePath, variant);

  const profile = profileFor(type);
  const { message, digest } = await buildMessage(profile, artifactPath, options);
  const outcome = verifyTag(message, key, signature.tag);

  const result: VerifyResult = {
    outcome,
    artifactPath,
    signaturePath,
    profile,
    digest,
  };

  if ('digest' in signature && signature.digest !== digest) {
    result.reason = 'artifact digest changed';
  } else if (outcome === 'tamper') {
    result.reason = 'tag mismatch';
  }

  return result;
}

/**
 * Load a raw-signed JSON config only if its bare signature verifies
 *
 * The config is read once; the verified bytes are the parsed bytes.
 *
 * @returns Parsed config, or null when the signature does not match
 * @throws IoError if either file cannot be read
 * @throws FormatError if the signature is malformed or the config is not JSON
 */
export async function loadVerifiedConfig(
  configPath: string,
  signaturePath: string,
  key: KeyMaterial
): Promise<unknown> {
  const { tag } = await readSignature(signaturePath, 'bare');

  let raw: Uint8Array;
  try {
    raw = await fs.readFile(configPath);
  } catch (error) {
    throw toIoError('read config', configPath, error);
  }

  if (verifyTag(raw, key, tag) === 'tamper') {
    return null;
  }

  try {
    return JSON.parse(new TextDecoder().decode(raw));
  } catch (error) {
    throw new FormatError(
      `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : error}`,
      configPath
    );
  }
}
