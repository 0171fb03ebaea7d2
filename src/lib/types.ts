/**
 * Type definitions for HMAC-SHA256 artifact signing
 */

/**
 * Shared secret used for the keyed tag. Lives only in process memory.
 */
export type KeyMaterial = Uint8Array;

/**
 * Lowercase hex SHA-256 of an artifact's full byte stream (64 chars)
 */
export type ArtifactDigest = string;

/**
 * Lowercase hex HMAC-SHA256 value (64 chars)
 */
export type IntegrityTag = string;

/**
 * Where the signing key comes from. Exactly one source per invocation.
 */
export type KeySource =
  | { kind: 'literal'; value: string }
  | { kind: 'env'; name: string }
  | { kind: 'file'; path: string }
  | { kind: 'identity'; deviceId: string; packageName: string };

/**
 * Which bytes are fed into the keyed tag
 *
 * - `digest-then-mac`: UTF-8 of the artifact's hex SHA-256 digest
 * - `direct-mac`: the artifact's raw bytes
 * - `canonical-json-mac`: RFC 8785 canonical form of a JSON artifact
 */
export type SigningProfile = 'digest-then-mac' | 'direct-mac' | 'canonical-json-mac';

/**
 * Kind of artifact being signed. Each kind has exactly one profile.
 */
export type ArtifactType = 'package' | 'config' | 'config-json';

/**
 * Persisted form of a tag
 */
export type SignatureVariant = 'bare' | 'structured';

/**
 * Structured signature record
 */
export interface SignatureRecord {
  artifactName: string;
  artifactAbsolutePath: string;
  digest: ArtifactDigest;
  tag: IntegrityTag;
  keyProfile: string;
  algorithm: 'HMAC-SHA256';
  hashAlgorithm: 'SHA-256';
  createdAtUnixSeconds: number;
  formatVersion: string;
}

/**
 * Bare signature: the tag and nothing else
 */
export interface BareSignature {
  tag: IntegrityTag;
}

/**
 * On-disk JSON form of a structured signature record
 */
export interface SignatureSidecar {
  apk_file: string;
  apk_path: string;
  apk_hash: string;
  hmac_signature: string;
  key_type: string;
  timestamp: number;
  algorithm: 'HMAC-SHA256';
  hash_algorithm: 'SHA-256';
  version: string;
}

/**
 * Outcome of comparing a recomputed tag with a stored one
 */
export type VerifyOutcome = 'match' | 'tamper';

/**
 * Result of verifying an artifact against its signature file
 */
export interface VerifyResult {
  outcome: VerifyOutcome;
  artifactPath: string;
  signaturePath: string;
  profile: SigningProfile;
  digest: ArtifactDigest;
  reason?: string;
}

/**
 * Result of signing an artifact
 */
export interface SignResult {
  tag: IntegrityTag;
  digest: ArtifactDigest;
  profile: SigningProfile;
  signaturePath: string;
  variant: SignatureVariant;
  record?: SignatureRecord;
  /** Truncated key for diagnostics only */
  keyPreview: string;
}

/**
 * Inspection result for human-readable output
 */
export interface InspectionResult {
  artifactName: string;
  artifactPath: string;
  digest: ArtifactDigest;
  tag: IntegrityTag;
  keyType: string;
  algorithm: string;
  hashAlgorithm: string;
  created: string;
  formatVersion: string;
}
