/**
 * Signing: artifact -> HMAC-SHA256 tag -> signature file
 */

import * as path from 'node:path';
import { describeKeySource, deriveKey } from './key.js';
import { previewKey, wipeKey } from './keygen.js';
import { FORMAT_VERSION, signaturePathFor, variantForPath, writeSignature } from './signature.js';
import { buildMessage, computeTag, profileFor } from './tag.js';
import type { DigestOptions } from './digest.js';
import type {
  ArtifactDigest,
  ArtifactType,
  IntegrityTag,
  KeySource,
  SignatureRecord,
  SignatureVariant,
  SignResult,
} from './types.js';

/**
 * Sign options for customizing output
 */
export interface SignOptions extends DigestOptions {
  /** Output path (default: artifact extension replaced by .sig / .sig.json) */
  output?: string;
  /** Signature variant; inferred from output when omitted, else bare */
  variant?: SignatureVariant;
  /** Clock in milliseconds, for the structured timestamp */
  now?: () => number;
  /** Environment used to resolve `env` key sources */
  env?: NodeJS.ProcessEnv;
}

/**
 * Assemble a structured signature record
 */
export function createSignatureRecord(
  artifactPath: string,
  digest: ArtifactDigest,
  tag: IntegrityTag,
  keyProfile: string,
  createdAtMs: number = Date.now()
): SignatureRecord {
  const absolutePath = path.resolve(artifactPath);
  return {
    artifactName: path.basename(absolutePath),
    artifactAbsolutePath: absolutePath,
    digest,
    tag,
    keyProfile,
    algorithm: 'HMAC-SHA256',
    hashAlgorithm: 'SHA-256',
    createdAtUnixSeconds: Math.floor(createdAtMs / 1000),
    formatVersion: FORMAT_VERSION,
  };
}

function resolveVariant(options?: SignOptions): SignatureVariant {
  if (options?.variant) return options.variant;
  if (options?.output) return variantForPath(options.output);
  return 'bare';
}

/**
 * Sign an artifact and write its signature file
 *
 * The key is resolved, used once and wiped before returning.
 *
 * @param artifactPath - File to sign
 * @param type - Artifact type; fixes the signing profile
 * @param keySource - Where the key comes from
 * @param options - Output, variant, chunk size and clock
 * @throws IoError, KeyUnavailableError
 */
export async function signArtifact(
  artifactPath: string,
  type: ArtifactType,
  keySource: KeySource,
  options?: SignOptions
): Promise<SignResult> {
  const variant = resolveVariant(options);
  const signaturePath = options?.output ?? signaturePathFor(artifactPath, variant);
  const profile = profileFor(type);

  const key = deriveKey(keySource, options?.env);
  try {
    const { message, digest } = await buildMessage(profile, artifactPath, options);
    const tag = computeTag(message, key);

    const record =
      variant === 'structured'
        ? createSignatureRecord(
            artifactPath,
            digest,
            tag,
            describeKeySource(keySource),
            (options?.now ?? Date.now)()
          )
        : undefined;

    await writeSignature(signaturePath, tag, variant, record);

    return {
      tag,
      digest,
      profile,
      signaturePath,
      variant,
      record,
      keyPreview: previewKey(key),
    };
  } finally {
    wipeKey(key);
  }
}
