/**
 * artifact-hmac-tools
 * Tamper-evident HMAC-SHA256 signing and verification of build artifacts
 */

// Core functions
export { signArtifact, createSignatureRecord } from './sign.js';
export type { SignOptions } from './sign.js';

export { verifyTag, verifyArtifact, loadVerifiedConfig, constantTimeEqualHex } from './verify.js';
export type { VerifyArtifactOptions } from './verify.js';

export {
  computeTag,
  buildMessage,
  digestMessage,
  canonicalJsonMessage,
  profileFor,
  isArtifactType,
  ARTIFACT_PROFILES,
  ARTIFACT_TYPES,
} from './tag.js';
export type { ProfileMessage } from './tag.js';

export { digest, digestSync, digestFile, digestFileSync, chunk, DEFAULT_CHUNK_SIZE } from './digest.js';
export type { DigestOptions } from './digest.js';

export { inspectSignature, inspectSignatureJson, inspectRecord } from './inspect.js';

export { keygen, keyToHex, hexToKey, previewKey, wipeKey, DEFAULT_KEY_LENGTH } from './keygen.js';

// Key sources
export {
  deriveKey,
  deriveIdentityKey,
  describeKeySource,
  SimulatedKeyStore,
} from './key.js';
export type { KeyStore } from './key.js';

// Signature files
export {
  writeSignature,
  readSignature,
  parseSignature,
  serializeSignature,
  toSidecar,
  fromSidecar,
  parseHex64,
  signaturePathFor,
  variantForPath,
  FORMAT_VERSION,
} from './signature.js';

// Errors
export {
  ArtifactSigningError,
  IoError,
  KeyUnavailableError,
  FormatError,
} from './errors.js';
export type { ArtifactSigningErrorCode } from './errors.js';

// Types
export type {
  KeyMaterial,
  ArtifactDigest,
  IntegrityTag,
  KeySource,
  SigningProfile,
  ArtifactType,
  SignatureVariant,
  SignatureRecord,
  BareSignature,
  SignatureSidecar,
  VerifyOutcome,
  VerifyResult,
  SignResult,
  InspectionResult,
} from './types.js';
