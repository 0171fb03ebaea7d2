/**
 * Inspection: human-readable summary of a structured signature
 */

import type { InspectionResult, SignatureRecord } from './types.js';

/**
 * Shorten a long value for display (show first and last parts)
 */
function truncateMiddle(value: string, maxLength = 50): string {
  if (value.length <= maxLength) return value;

  const prefix = value.slice(0, 20);
  const suffix = value.slice(-15);
  return `${prefix}...${suffix}`;
}

/**
 * Summarize a structured signature record
 */
export function inspectRecord(record: SignatureRecord): InspectionResult {
  return {
    artifactName: record.artifactName,
    artifactPath: record.artifactAbsolutePath,
    digest: record.digest,
    tag: record.tag,
    keyType: record.keyProfile,
    algorithm: record.algorithm,
    hashAlgorithm: record.hashAlgorithm,
    created: new Date(record.createdAtUnixSeconds * 1000).toISOString(),
    formatVersion: record.formatVersion,
  };
}

/**
 * Generate human-readable inspection output
 *
 * @param record - A structured signature, as returned by `readSignature`
 * @returns Formatted string for terminal display
 */
export function inspectSignature(record: SignatureRecord): string {
  const result = inspectRecord(record);

  const lines: string[] = [];
  lines.push(`Signature for ${result.artifactName} (v${result.formatVersion})`);
  lines.push('━'.repeat(41));
  lines.push(`Path: ${truncateMiddle(result.artifactPath)}`);
  lines.push(`Created: ${result.created}`);
  lines.push(`Key type: ${result.keyType}`);

  lines.push('');
  lines.push('Integrity:');
  lines.push(`  ${result.hashAlgorithm}: ${result.digest}`);
  lines.push(`  ${result.algorithm}: ${result.tag}`);

  return lines.join('\n');
}

/**
 * Generate JSON inspection output
 */
export function inspectSignatureJson(record: SignatureRecord): object {
  const result = inspectRecord(record);

  return {
    artifact: {
      name: result.artifactName,
      path: result.artifactPath,
    },
    signature: {
      algorithm: result.algorithm,
      hashAlgorithm: result.hashAlgorithm,
      digest: result.digest,
      tag: result.tag,
      keyType: result.keyType,
    },
    created: result.created,
    formatVersion: result.formatVersion,
  };
}
