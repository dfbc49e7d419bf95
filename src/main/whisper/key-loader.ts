/**
 * Private key resolution
 *
 * Sources, highest priority first: keep vault (--keep-key), key file
 * (--nsec-file), argument (--nsec), NOSTR_NSEC environment variable.
 */

import fs from 'fs';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { ExitCode } from '../../shared/types';
import { deriveKeypair, NostrKeypair, parseSecretKey, wipeKeypair } from './crypto';
import { toErrorMessage, WhisperError } from './errors';
import { log } from '../logging';

const execFileAsync = promisify(execFile);

const KEEP_KEY_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const MAX_KEY_LINE_LENGTH = 255;

export interface KeySource {
  nsec?: string;
  nsecFile?: string;
  keepKey?: string;
}

export type KeepExporter = (keyName: string) => Promise<string>;

async function exportFromKeep(keyName: string): Promise<string> {
  const { stdout } = await execFileAsync('keep', ['export', '--name', keyName], { encoding: 'utf8' });
  return stdout;
}

function readKeyFile(filePath: string): string {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new WhisperError(`Could not read key file: ${filePath}`, ExitCode.KeyError, error instanceof Error ? error : undefined);
  }
  const firstLine = content.split('\n')[0].slice(0, MAX_KEY_LINE_LENGTH);
  return firstLine.replace(/[\r\n ]+$/, '');
}

async function resolveKeyText(
  source: KeySource,
  env: NodeJS.ProcessEnv,
  keepExporter: KeepExporter
): Promise<string> {
  if (source.keepKey !== undefined) {
    if (!KEEP_KEY_NAME_PATTERN.test(source.keepKey)) {
      throw new WhisperError(`Invalid key name '${source.keepKey}'`, ExitCode.KeyError);
    }
    try {
      const exported = (await keepExporter(source.keepKey)).split('\n')[0].trim();
      if (exported.length === 0) {
        throw new Error('empty output');
      }
      return exported;
    } catch (error) {
      log('warn', `keep export failed for key '${source.keepKey}': ${toErrorMessage(error)}`);
      throw new WhisperError(
        `Failed to get key '${source.keepKey}' from keep vault (is keep installed and the vault unlocked?)`,
        ExitCode.KeyError
      );
    }
  }

  if (source.nsecFile !== undefined) {
    return readKeyFile(source.nsecFile);
  }

  if (source.nsec !== undefined) {
    return source.nsec;
  }

  const fromEnv = env.NOSTR_NSEC;
  if (fromEnv) {
    return fromEnv;
  }

  throw new WhisperError(
    'No private key provided (use --keep-key, --nsec-file, --nsec, or set NOSTR_NSEC)',
    ExitCode.KeyError
  );
}

/**
 * Resolves and parses the local private key.
 *
 * @throws WhisperError with ExitCode.KeyError for a missing, unreadable or malformed key
 */
export async function loadKeypair(
  source: KeySource,
  env: NodeJS.ProcessEnv = process.env,
  keepExporter: KeepExporter = exportFromKeep
): Promise<NostrKeypair> {
  const keyText = await resolveKeyText(source, env, keepExporter);

  let secretKey: Uint8Array;
  try {
    secretKey = parseSecretKey(keyText);
  } catch (error) {
    throw new WhisperError(
      `Failed to parse private key: ${toErrorMessage(error)}`,
      ExitCode.KeyError,
      error instanceof Error ? error : undefined
    );
  }

  try {
    return deriveKeypair(secretKey);
  } catch (error) {
    secretKey.fill(0);
    throw new WhisperError(
      `Failed to derive public key: ${toErrorMessage(error)}`,
      ExitCode.KeyError,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Runs fn with the keypair and zeroes the secret key afterwards, whether fn
 * returns, throws or rejects.
 */
export async function withKeypair<T>(keypair: NostrKeypair, fn: (keypair: NostrKeypair) => Promise<T>): Promise<T> {
  try {
    return await fn(keypair);
  } finally {
    wipeKeypair(keypair);
  }
}
