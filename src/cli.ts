#!/usr/bin/env node
/**
 * artsig - Command line interface for HMAC artifact signing
 *
 * Commands:
 *   sign-package - Tag an application package over its SHA-256 digest
 *   sign-config  - Tag a configuration file over its raw (or canonical) bytes
 *   verify       - Check an artifact against its signature file
 *   inspect      - Inspect a structured signature file
 *   keygen       - Generate a random HMAC key
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { signArtifact } from './lib/sign.js';
import { verifyArtifact } from './lib/verify.js';
import { inspectSignature, inspectSignatureJson } from './lib/inspect.js';
import { keygen, keyToHex, previewKey, wipeKey, DEFAULT_KEY_LENGTH } from './lib/keygen.js';
import { deriveKey } from './lib/key.js';
import { readSignature, signaturePathFor } from './lib/signature.js';
import { isArtifactType, ARTIFACT_TYPES } from './lib/tag.js';
import { keySourceFromFlags, resolveChunkSize, type KeyFlags } from './config.js';
import type { ArtifactType, SignatureVariant, SignResult } from './lib/types.js';

// Get package version
const __dirname = path.dirname(fileURLToPath(import.meta.url));
let version = '0.1.0';
try {
  const pkgPath = path.resolve(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    version = pkg.version;
  }
} catch {
  // Use default version
}

const program = new Command();

program
  .name('artsig')
  .description('Tamper-evident HMAC-SHA256 signing for build artifacts')
  .version(version);

interface VariantFlags {
  bare?: boolean;
  structured?: boolean;
}

interface SignCommandOptions extends KeyFlags, VariantFlags {
  output?: string;
  chunkSize?: string;
  verbose?: boolean;
}

interface SignConfigCommandOptions extends KeyFlags, VariantFlags {
  output?: string;
  canonical?: boolean;
  verbose?: boolean;
}

interface VerifyCommandOptions extends KeyFlags, VariantFlags {
  type: string;
  signature?: string;
  chunkSize?: string;
  verbose?: boolean;
}

/**
 * Add the mutually exclusive key source options
 */
function addKeyOptions(command: Command): Command {
  return command
    .addOption(
      new Option('--key <value>', 'HMAC key as a literal string').conflicts([
        'keyEnv',
        'keyFile',
        'deviceId',
      ])
    )
    .addOption(
      new Option('--key-env <name>', 'Environment variable holding the key (default: CONFIG_HMAC_KEY)')
        .conflicts(['keyFile', 'deviceId'])
    )
    .addOption(new Option('--key-file <path>', 'File holding the key').conflicts(['deviceId']))
    .addOption(new Option('--device-id <id>', 'Simulated device-bound key: device id (not for production)'))
    .addOption(new Option('--package-name <name>', 'Simulated device-bound key: package name'));
}

function addVariantOptions(command: Command): Command {
  return command
    .addOption(new Option('--structured', 'Write/read a JSON signature with metadata').conflicts('bare'))
    .addOption(new Option('--bare', 'Write/read the hex tag only'));
}

/**
 * Variant from flags; undefined lets the output path decide
 */
function variantFromFlags(flags: VariantFlags): SignatureVariant | undefined {
  if (flags.structured) return 'structured';
  if (flags.bare) return 'bare';
  return undefined;
}

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
}

function printSignResult(result: SignResult, verbose: boolean | undefined): void {
  console.log(chalk.green('✓') + ' Signature written to: ' + chalk.cyan(result.signaturePath));
  console.log('  Tag: ' + chalk.dim(result.tag.slice(0, 16) + '...'));
  if (verbose) {
    console.log('  Profile: ' + chalk.dim(result.profile));
    console.log('  Variant: ' + chalk.dim(result.variant));
    console.log('  Digest:  ' + chalk.dim(result.digest));
    console.log('  Key:     ' + chalk.dim(result.keyPreview));
  }
}

// ============================================================================
// SIGN-PACKAGE COMMAND
// ============================================================================

addVariantOptions(
  addKeyOptions(
    program
      .command('sign-package')
      .description('Sign an application package (HMAC over its SHA-256 digest)')
      .argument('<artifact>', 'Path to the package file')
      .option('-o, --output <path>', 'Output path (default: <artifact>.sig.json)')
      .option('--chunk-size <bytes>', 'Streaming chunk size in bytes (8192-1048576)')
      .option('-v, --verbose', 'Show digest, profile and key preview')
  )
).action(async (artifact: string, options: SignCommandOptions) => {
  try {
    const result = await signArtifact(artifact, 'package', keySourceFromFlags(options), {
      output: options.output,
      variant: variantFromFlags(options) ?? (options.output ? undefined : 'structured'),
      chunkSize: resolveChunkSize(options.chunkSize),
    });
    printSignResult(result, options.verbose);
  } catch (error) {
    fail(error);
  }
});

// ============================================================================
// SIGN-CONFIG COMMAND
// ============================================================================

addVariantOptions(
  addKeyOptions(
    program
      .command('sign-config')
      .description('Sign a configuration file (HMAC over its raw bytes)')
      .argument('<config>', 'Path to the configuration file')
      .option('-o, --output <path>', 'Output path (default: <config>.sig)')
      .option('--canonical', 'Sign the canonical JSON form instead of the raw bytes')
      .option('-v, --verbose', 'Show digest, profile and key preview')
  )
).action(async (config: string, options: SignConfigCommandOptions) => {
  try {
    const type: ArtifactType = options.canonical ? 'config-json' : 'config';
    const result = await signArtifact(config, type, keySourceFromFlags(options), {
      output: options.output,
      variant: variantFromFlags(options),
    });
    printSignResult(result, options.verbose);
  } catch (error) {
    fail(error);
  }
});

// ============================================================================
// VERIFY COMMAND
// ============================================================================

addVariantOptions(
  addKeyOptions(
    program
      .command('verify')
      .description('Verify an artifact against its signature file')
      .argument('<artifact>', 'Path to the artifact')
      .addOption(
        new Option('-t, --type <type>', 'Artifact type').choices(ARTIFACT_TYPES).makeOptionMandatory()
      )
      .option('-s, --signature <path>', 'Signature file (default: derived from the artifact path)')
      .option('--chunk-size <bytes>', 'Streaming chunk size for packages (8192-1048576)')
      .option('-v, --verbose', 'Show digest and profile')
  )
).action(async (artifact: string, options: VerifyCommandOptions) => {
  try {
    if (!isArtifactType(options.type)) {
      throw new Error(`Unknown artifact type: ${options.type}`);
    }
    const type = options.type;

    const fallbackVariant: SignatureVariant = type === 'package' ? 'structured' : 'bare';
    const variant = variantFromFlags(options) ?? (options.signature ? undefined : fallbackVariant);
    const signaturePath = options.signature ?? signaturePathFor(artifact, fallbackVariant);
    const chunkSize = resolveChunkSize(options.chunkSize);

    const key = deriveKey(keySourceFromFlags(options));
    const result = await verifyArtifact(artifact, type, key, signaturePath, {
      variant,
      chunkSize,
    }).finally(() => wipeKey(key));

    if (options.verbose) {
      console.log('  Signature: ' + chalk.cyan(result.signaturePath));
      console.log('  Profile:   ' + chalk.dim(result.profile));
      console.log('  Digest:    ' + chalk.dim(result.digest));
    }

    if (result.outcome === 'match') {
      console.log(chalk.green('MATCH') + ' - Signature verified for ' + chalk.cyan(artifact));
      if (result.reason) {
        console.log(chalk.yellow('  Warning: ') + result.reason);
      }
    } else {
      console.log(chalk.red('TAMPER') + ' - ' + (result.reason ?? 'tag mismatch') + ': ' + chalk.cyan(artifact));
      process.exit(1);
    }
  } catch (error) {
    fail(error);
  }
});

// ============================================================================
// INSPECT COMMAND
// ============================================================================

program
  .command('inspect')
  .description('Inspect a structured signature file')
  .argument('<signature>', 'Path to a .sig.json signature')
  .option('--json', 'Output as JSON')
  .action(async (signature: string, options: { json?: boolean }) => {
    try {
      const record = await readSignature(signature, 'structured');

      if (options.json) {
        console.log(JSON.stringify(inspectSignatureJson(record), null, 2));
      } else {
        console.log(inspectSignature(record));
      }
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// KEYGEN COMMAND
// ============================================================================

program
  .command('keygen')
  .description('Generate a random HMAC key (hex-encoded)')
  .option('-o, --output <path>', 'Write the key to a file instead of stdout')
  .option('--bytes <n>', 'Key length in bytes', String(DEFAULT_KEY_LENGTH))
  .action((options: { output?: string; bytes: string }) => {
    try {
      const key = keygen(Number(options.bytes));
      try {
        if (options.output) {
          fs.writeFileSync(options.output, keyToHex(key), { mode: 0o600 });
          console.log(chalk.green('✓') + ' Key written to: ' + chalk.cyan(options.output));
          console.log('  Preview: ' + chalk.dim(previewKey(key)));
        } else {
          console.log(keyToHex(key));
        }
      } finally {
        wipeKey(key);
      }
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// PARSE AND EXECUTE
// ============================================================================

await program.parseAsync();
