/**
 * Error taxonomy for artifact signing
 *
 * Every error names the artifact, file or variable involved. Key bytes
 * never appear in a message.
 */

export type ArtifactSigningErrorCode = 'IO_ERROR' | 'KEY_UNAVAILABLE' | 'FORMAT_ERROR';

/**
 * Base class for all fatal signing and verification errors
 */
export class ArtifactSigningError extends Error {
  readonly code: ArtifactSigningErrorCode;
  /** File path or variable name the error is about */
  readonly subject?: string;

  constructor(code: ArtifactSigningErrorCode, message: string, subject?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.subject = subject;
  }
}

/**
 * Artifact, key file or signature file could not be read or written
 */
export class IoError extends ArtifactSigningError {
  constructor(message: string, path: string, cause?: unknown) {
    super('IO_ERROR', message, path, cause);
  }
}

/**
 * No usable key could be resolved from the selected key source
 */
export class KeyUnavailableError extends ArtifactSigningError {
  constructor(message: string, subject?: string) {
    super('KEY_UNAVAILABLE', message, subject);
  }
}

/**
 * Signature artifact or tag is malformed
 */
export class FormatError extends ArtifactSigningError {
  constructor(message: string, path?: string) {
    super('FORMAT_ERROR', message, path);
  }
}

/**
 * Wrap a Node filesystem error as an IoError
 */
export function toIoError(action: string, path: string, error: unknown): IoError {
  if (error instanceof IoError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new IoError(`Failed to ${action} ${path}: ${reason}`, path, error);
}
