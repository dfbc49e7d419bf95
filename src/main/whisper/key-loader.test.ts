import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import * as nip19 from 'nostr-tools/nip19';
import { ExitCode } from '../../shared/types';
import { deriveKeypair, parseSecretKey } from './crypto';
import { WhisperError } from './errors';
import { KeepExporter, loadKeypair, withKeypair } from './key-loader';

jest.mock('../logging', () => ({
  log: jest.fn(),
}));

const FILE_KEY_HEX = '03'.repeat(32);
const ARG_KEY_HEX = '04'.repeat(32);
const ENV_KEY_HEX = '05'.repeat(32);
const KEEP_KEY_HEX = '06'.repeat(32);

function pubkeyOf(hex: string): string {
  return deriveKeypair(parseSecretKey(hex)).pubkeyHex;
}

async function expectKeyError(promise: Promise<unknown>, message: string): Promise<void> {
  const error = await promise.catch((caught: unknown) => caught);
  expect(error).toBeInstanceOf(WhisperError);
  expect(error).toMatchObject({ exitCode: ExitCode.KeyError });
  expect(error instanceof Error ? error.message : '').toContain(message);
}

describe('key-loader', () => {
  let dir: string;
  let keyFile: string;
  const noKeep: KeepExporter = () => Promise.reject(new Error('keep should not be called'));

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'whisper-keys-'));
    keyFile = path.join(dir, 'key');
    fs.writeFileSync(keyFile, `${FILE_KEY_HEX}\r\nsecond line\n`);
  });

  describe('loadKeypair priority', () => {
    it('prefers the keep vault over every other source', async () => {
      const keep = jest.fn<KeepExporter>().mockResolvedValue(`${nip19.nsecEncode(parseSecretKey(KEEP_KEY_HEX))}\n`);

      const keypair = await loadKeypair(
        { keepKey: 'main', nsecFile: keyFile, nsec: ARG_KEY_HEX },
        { NOSTR_NSEC: ENV_KEY_HEX },
        keep
      );

      expect(keep).toHaveBeenCalledWith('main');
      expect(keypair.pubkeyHex).toBe(pubkeyOf(KEEP_KEY_HEX));
    });

    it('uses the key file before the argument and environment', async () => {
      const keypair = await loadKeypair({ nsecFile: keyFile, nsec: ARG_KEY_HEX }, { NOSTR_NSEC: ENV_KEY_HEX }, noKeep);

      expect(keypair.pubkeyHex).toBe(pubkeyOf(FILE_KEY_HEX));
    });

    it('uses the argument before the environment', async () => {
      const keypair = await loadKeypair({ nsec: ARG_KEY_HEX }, { NOSTR_NSEC: ENV_KEY_HEX }, noKeep);

      expect(keypair.pubkeyHex).toBe(pubkeyOf(ARG_KEY_HEX));
    });

    it('falls back to NOSTR_NSEC', async () => {
      const keypair = await loadKeypair({}, { NOSTR_NSEC: ENV_KEY_HEX }, noKeep);

      expect(keypair.pubkeyHex).toBe(pubkeyOf(ENV_KEY_HEX));
    });
  });

  describe('loadKeypair failures', () => {
    it('reports a missing key', async () => {
      await expectKeyError(
        loadKeypair({}, {}, noKeep),
        'No private key provided (use --keep-key, --nsec-file, --nsec, or set NOSTR_NSEC)'
      );
    });

    it('rejects keep key names outside [A-Za-z0-9_-] without running keep', async () => {
      const keep = jest.fn<KeepExporter>();

      await expectKeyError(loadKeypair({ keepKey: 'main; rm -rf ~' }, {}, keep), "Invalid key name 'main; rm -rf ~'");
      expect(keep).not.toHaveBeenCalled();
    });

    it('reports a failing keep export', async () => {
      const keep = jest.fn<KeepExporter>().mockRejectedValue(new Error('vault locked'));

      await expectKeyError(loadKeypair({ keepKey: 'main' }, {}, keep), "Failed to get key 'main' from keep vault");
    });

    it('reports an unreadable key file', async () => {
      await expectKeyError(loadKeypair({ nsecFile: path.join(dir, 'missing') }, {}, noKeep), 'Could not read key file');
    });

    it('reports a malformed key', async () => {
      await expectKeyError(loadKeypair({ nsec: 'hunter2' }, {}, noKeep), 'Failed to parse private key');
    });
  });

  describe('withKeypair', () => {
    it('wipes the secret key after fn resolves', async () => {
      const keypair = deriveKeypair(parseSecretKey(ARG_KEY_HEX));

      const result = await withKeypair(keypair, async (kp) => kp.pubkeyHex);

      expect(result).toBe(pubkeyOf(ARG_KEY_HEX));
      expect(keypair.secretKey.every((byte) => byte === 0)).toBe(true);
    });

    it('wipes the secret key when fn rejects', async () => {
      const keypair = deriveKeypair(parseSecretKey(ARG_KEY_HEX));

      await expect(withKeypair(keypair, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
      expect(keypair.secretKey.every((byte) => byte === 0)).toBe(true);
    });
  });
});
