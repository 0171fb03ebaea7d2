/**
 * Signature artifacts: persisting and reading tags
 *
 * Two on-disk variants:
 * - bare: exactly the lowercase hex tag, no trailing newline
 * - structured: JSON sidecar with the tag, digest and metadata
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FormatError, toIoError } from './errors.js';
import type {
  BareSignature,
  IntegrityTag,
  SignatureRecord,
  SignatureSidecar,
  SignatureVariant,
} from './types.js';

/** Version written into every structured sidecar */
export const FORMAT_VERSION = '1.0.0';

/** Sidecar major versions this reader understands */
const SUPPORTED_MAJOR_VERSION = 1;

const HEX_64 = /^[0-9a-fA-F]{64}$/;

/**
 * Check a 64-char SHA-256-sized hex value and normalize it to lowercase
 *
 * @throws FormatError on anything else
 */
export function parseHex64(value: unknown, field: string, source?: string): string {
  if (typeof value !== 'string' || !HEX_64.test(value)) {
    const where = source ? ` in ${source}` : '';
    throw new FormatError(`Invalid ${field}${where}: expected 64 hex characters`, source);
  }
  return value.toLowerCase();
}

/**
 * Map an in-memory record to its on-disk field names
 */
export function toSidecar(record: SignatureRecord): SignatureSidecar {
  return {
    apk_file: record.artifactName,
    apk_path: record.artifactAbsolutePath,
    apk_hash: record.digest,
    hmac_signature: record.tag,
    key_type: record.keyProfile,
    timestamp: record.createdAtUnixSeconds,
    algorithm: record.algorithm,
    hash_algorithm: record.hashAlgorithm,
    version: record.formatVersion,
  };
}

function requireString(obj: Record<string, unknown>, field: string, source?: string): string {
  const value = obj[field];
  if (typeof value !== 'string') {
    const where = source ? ` in ${source}` : '';
    throw new FormatError(`Invalid signature${where}: missing field '${field}'`, source);
  }
  return value;
}

/** Largest |timestamp| a Date can represent (8.64e15 ms) */
const MAX_TIMESTAMP_SECONDS = 8_640_000_000_000;

/**
 * Validate a parsed sidecar object and map it to a record
 *
 * @param value - Parsed JSON
 * @param source - Path it came from, for error messages
 * @throws FormatError if a field is missing, mistyped or out of format
 */
export function fromSidecar(value: unknown, source?: string): SignatureRecord {
  const where = source ? ` in ${source}` : '';
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new FormatError(`Invalid signature${where}: must be a JSON object`, source);
  }

  const s = value as Record<string, unknown>;

  const version = requireString(s, 'version', source);
  const major = Number(version.split('.')[0]);
  if (major !== SUPPORTED_MAJOR_VERSION) {
    throw new FormatError(`Unsupported signature format version${where}: ${version}`, source);
  }

  const algorithm = requireString(s, 'algorithm', source);
  if (algorithm !== 'HMAC-SHA256') {
    throw new FormatError(
      `Invalid signature${where}: algorithm must be "HMAC-SHA256", got "${algorithm}"`,
      source
    );
  }

  const hashAlgorithm = requireString(s, 'hash_algorithm', source);
  if (hashAlgorithm !== 'SHA-256') {
    throw new FormatError(
      `Invalid signature${where}: hash_algorithm must be "SHA-256", got "${hashAlgorithm}"`,
      source
    );
  }

  const timestamp = s.timestamp;
  if (typeof timestamp !== 'number' || !Number.isInteger(timestamp)) {
    throw new FormatError(`Invalid signature${where}: missing field 'timestamp'`, source);
  }
  if (Math.abs(timestamp) > MAX_TIMESTAMP_SECONDS) {
    throw new FormatError(`Invalid signature${where}: timestamp out of range: ${timestamp}`, source);
  }

  return {
    artifactName: requireString(s, 'apk_file', source),
    artifactAbsolutePath: requireString(s, 'apk_path', source),
    digest: parseHex64(requireString(s, 'apk_hash', source), 'apk_hash', source),
    tag: parseHex64(requireString(s, 'hmac_signature', source), 'hmac_signature', source),
    keyProfile: requireString(s, 'key_type', source),
    algorithm,
    hashAlgorithm,
    createdAtUnixSeconds: timestamp,
    formatVersion: version,
  };
}

/**
 * Serialize a signature to the text written on disk
 */
export function serializeSignature(
  tag: IntegrityTag,
  variant: SignatureVariant,
  record?: SignatureRecord
): string {
  if (variant === 'bare') {
    return parseHex64(tag, 'tag');
  }
  if (!record) {
    throw new Error('A structured signature needs a signature record');
  }
  if (record.tag !== tag) {
    throw new Error('Signature record tag does not match the tag being written');
  }
  return JSON.stringify(toSidecar(record), null, 2);
}

/**
 * Write a signature file, replacing any existing one
 *
 * @param destination - Output path
 * @param tag - Tag to persist
 * @param variant - bare or structured
 * @param record - Required for the structured variant
 * @throws IoError if the file cannot be written
 */
export async function writeSignature(
  destination: string,
  tag: IntegrityTag,
  variant: SignatureVariant,
  record?: SignatureRecord
): Promise<void> {
  const content = serializeSignature(tag, variant, record);
  try {
    await fs.writeFile(destination, content, 'utf-8');
  } catch (error) {
    throw toIoError('write signature', destination, error);
  }
}

/**
 * Parse signature file text
 */
export function parseSignature(content: string, variant: 'bare', source?: string): BareSignature;
export function parseSignature(
  content: string,
  variant: 'structured',
  source?: string
): SignatureRecord;
export function parseSignature(
  content: string,
  variant: SignatureVariant,
  source?: string
): BareSignature | SignatureRecord;
export function parseSignature(
  content: string,
  variant: SignatureVariant,
  source?: string
): BareSignature | SignatureRecord {
  if (variant === 'bare') {
    return { tag: parseHex64(content.trim(), 'signature', source) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const where = source ? ` in ${source}` : '';
    throw new FormatError(
      `Invalid JSON${where}: ${error instanceof Error ? error.message : error}`,
      source
    );
  }
  return fromSidecar(parsed, source);
}

/**
 * Read a signature file
 *
 * @throws IoError if the file cannot be read
 * @throws FormatError if the content does not match the expected variant
 */
export async function readSignature(source: string, variant: 'bare'): Promise<BareSignature>;
export async function readSignature(
  source: string,
  variant: 'structured'
): Promise<SignatureRecord>;
export async function readSignature(
  source: string,
  variant: SignatureVariant
): Promise<BareSignature | SignatureRecord>;
export async function readSignature(
  source: string,
  variant: SignatureVariant
): Promise<BareSignature | SignatureRecord> {
  let content: string;
  try {
    content = await fs.readFile(source, 'utf-8');
  } catch (error) {
    throw toIoError('read signature', source, error);
  }
  return parseSignature(content, variant, source);
}

/**
 * Default signature path: the artifact's extension replaced with
 * `.sig` (bare) or `.sig.json` (structured)
 */
export function signaturePathFor(artifactPath: string, variant: SignatureVariant): string {
  const dir = path.dirname(artifactPath);
  const name = path.basename(artifactPath, path.extname(artifactPath));
  return path.join(dir, `${name}${variant === 'bare' ? '.sig' : '.sig.json'}`);
}

/**
 * Variant implied by an output path: `.json` means structured
 */
export function variantForPath(signaturePath: string): SignatureVariant {
  return signaturePath.toLowerCase().endsWith('.json') ? 'structured' : 'bare';
}
