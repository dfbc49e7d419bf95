import os from 'os';
import path from 'path';

const APP_DIR_NAME = 'whisper-dm';

/**
 * Directory holding config.yaml and logs/.
 * WHISPER_HOME overrides the default of ~/.config/whisper-dm (or $XDG_CONFIG_HOME/whisper-dm).
 */
export function getUserDataPath(): string {
  const override = process.env.WHISPER_HOME;
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }
  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, APP_DIR_NAME);
}
