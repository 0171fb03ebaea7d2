/**
 * CLI configuration: key source selection and streaming settings
 */

import { DEFAULT_CHUNK_SIZE } from './lib/digest.js';
import type { KeySource } from './lib/types.js';

/** Environment variable read when no key flag is given */
export const DEFAULT_KEY_ENV = 'CONFIG_HMAC_KEY';

/** Environment variable overriding the streaming chunk size */
export const CHUNK_SIZE_ENV = 'ARTSIG_CHUNK_SIZE';

export const MIN_CHUNK_SIZE = 8 * 1024;
export const MAX_CHUNK_SIZE = 1024 * 1024;

/**
 * Key flags as parsed by commander
 */
export interface KeyFlags {
  key?: string;
  keyEnv?: string;
  keyFile?: string;
  deviceId?: string;
  packageName?: string;
}

/**
 * Turn key flags into exactly one key source
 *
 * @throws Error when more than one source is selected or identity flags are incomplete
 */
export function keySourceFromFlags(flags: KeyFlags): KeySource {
  const sources: KeySource[] = [];

  if (flags.key !== undefined) {
    sources.push({ kind: 'literal', value: flags.key });
  }
  if (flags.keyEnv !== undefined) {
    sources.push({ kind: 'env', name: flags.keyEnv });
  }
  if (flags.keyFile !== undefined) {
    sources.push({ kind: 'file', path: flags.keyFile });
  }
  if (flags.deviceId !== undefined || flags.packageName !== undefined) {
    if (flags.deviceId === undefined || flags.packageName === undefined) {
      throw new Error('--device-id and --package-name must be given together');
    }
    sources.push({ kind: 'identity', deviceId: flags.deviceId, packageName: flags.packageName });
  }

  if (sources.length > 1) {
    throw new Error('Key options --key, --key-env, --key-file and --device-id are mutually exclusive');
  }

  return sources[0] ?? { kind: 'env', name: DEFAULT_KEY_ENV };
}

/**
 * Resolve the chunk size from a flag value, then the environment, then the default
 *
 * @throws Error if the value is not an integer within [8 KiB, 1 MiB]
 */
export function resolveChunkSize(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): number {
  const raw = flag ?? env[CHUNK_SIZE_ENV];
  if (raw === undefined || raw === '') {
    return DEFAULT_CHUNK_SIZE;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < MIN_CHUNK_SIZE || value > MAX_CHUNK_SIZE) {
    throw new Error(
      `Invalid chunk size: ${raw} (expected an integer between ${MIN_CHUNK_SIZE} and ${MAX_CHUNK_SIZE})`
    );
  }
  return value;
}
