/**
 * Tests for CLI configuration
 */

import { describe, it, expect } from 'vitest';

import {
  keySourceFromFlags,
  resolveChunkSize,
  DEFAULT_KEY_ENV,
  CHUNK_SIZE_ENV,
} from '../src/config.js';

describe('keySourceFromFlags', () => {
  it('should map each flag to its key source', () => {
    expect(keySourceFromFlags({ key: 'test-secret' })).toEqual({ kind: 'literal', value: 'test-secret' });
    expect(keySourceFromFlags({ keyEnv: 'SIGN_KEY' })).toEqual({ kind: 'env', name: 'SIGN_KEY' });
    expect(keySourceFromFlags({ keyFile: 'hmac.key' })).toEqual({ kind: 'file', path: 'hmac.key' });
    expect(keySourceFromFlags({ deviceId: 'test-device', packageName: 'com.example.app' })).toEqual({
      kind: 'identity',
      deviceId: 'test-device',
      packageName: 'com.example.app',
    });
  });

  it('should fall back to the default environment variable', () => {
    expect(keySourceFromFlags({})).toEqual({ kind: 'env', name: DEFAULT_KEY_ENV });
    expect(DEFAULT_KEY_ENV).toBe('CONFIG_HMAC_KEY');
  });

  it('should keep an empty literal so the key provider can reject it', () => {
    expect(keySourceFromFlags({ key: '' })).toEqual({ kind: 'literal', value: '' });
  });

  it('should reject more than one key source', () => {
    expect(() => keySourceFromFlags({ key: 'a', keyEnv: 'B' })).toThrow('mutually exclusive');
    expect(() =>
      keySourceFromFlags({ keyFile: 'hmac.key', deviceId: 'd', packageName: 'p' })
    ).toThrow('mutually exclusive');
  });

  it('should require both identity flags', () => {
    expect(() => keySourceFromFlags({ deviceId: 'test-device' })).toThrow(
      '--device-id and --package-name must be given together'
    );
    expect(() => keySourceFromFlags({ packageName: 'com.example.app' })).toThrow(
      '--device-id and --package-name must be given together'
    );
  });
});

describe('resolveChunkSize', () => {
  it('should default to 64 KiB', () => {
    expect(resolveChunkSize(undefined, {})).toBe(65536);
    expect(resolveChunkSize(undefined, { [CHUNK_SIZE_ENV]: '' })).toBe(65536);
  });

  it('should read the environment when no flag is given', () => {
    expect(resolveChunkSize(undefined, { [CHUNK_SIZE_ENV]: '16384' })).toBe(16384);
  });

  it('should prefer the flag over the environment', () => {
    expect(resolveChunkSize('8192', { [CHUNK_SIZE_ENV]: '16384' })).toBe(8192);
  });

  it('should reject sizes outside 8 KiB to 1 MiB', () => {
    expect(() => resolveChunkSize('4096', {})).toThrow('Invalid chunk size: 4096');
    expect(() => resolveChunkSize('2097152', {})).toThrow('Invalid chunk size');
    expect(() => resolveChunkSize('lots', {})).toThrow('Invalid chunk size');
  });
});
