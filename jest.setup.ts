/**
 * Jest Setup
 *
 * Keeps tests away from the real data directory and the user's key.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

process.env.WHISPER_HOME = fs.mkdtempSync(path.join(os.tmpdir(), 'whisper-test-'));
delete process.env.NOSTR_NSEC;
