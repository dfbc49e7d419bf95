import fs from 'fs';
import path from 'path';
import { AppConfig, LogLevel } from '../shared/types';
import { getUserDataPath } from './paths';
import { buildAppConfigYaml, parseYaml } from './yaml-utils';
import { log } from './logging';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'info',
  timeoutMs: 5000,
  historyLimit: 1000,
};

export function getConfigFilePath(): string {
  return path.join(getUserDataPath(), 'config.yaml');
}

/**
 * Reads config.yaml, writing a commented default file on first run.
 * Unreadable or malformed files fall back to defaults; never throws.
 */
export function loadConfig(): AppConfig {
  const configPath = getConfigFilePath();

  if (fs.existsSync(configPath)) {
    try {
      const content = fs.readFileSync(configPath, 'utf8');
      const result = parseYaml<unknown>(content);
      if (result.success) {
        return normalizeConfig(result.data);
      }
      log('warn', `Failed to parse YAML config: ${result.error?.message || 'unknown error'}`);
    } catch (error) {
      log('warn', `Failed to read YAML config: ${String(error)}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true, mode: 0o700 });
    fs.writeFileSync(configPath, buildAppConfigYaml(DEFAULT_CONFIG), { mode: 0o600 });
  } catch (error) {
    log('warn', `Failed to write default config: ${String(error)}`);
  }
  return { ...DEFAULT_CONFIG };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function positiveInteger(raw: unknown, field: string, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw === 'number' && Number.isInteger(raw) && raw > 0) {
    return raw;
  }
  log('warn', `Invalid ${field} in config (${String(raw)}), using ${fallback}`);
  return fallback;
}

export function normalizeConfig(raw: unknown): AppConfig {
  const source = isRecord(raw) ? raw : {};

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(source.logLevel)) {
    logLevel = source.logLevel;
  } else if (source.logLevel !== undefined) {
    log('warn', `Invalid logLevel in config (${String(source.logLevel)}), using ${logLevel}`);
  }

  const relay = typeof source.relay === 'string' && source.relay.trim().length > 0
    ? source.relay.trim()
    : undefined;

  return {
    logLevel,
    timeoutMs: positiveInteger(source.timeoutMs, 'timeoutMs', DEFAULT_CONFIG.timeoutMs),
    historyLimit: positiveInteger(source.historyLimit, 'historyLimit', DEFAULT_CONFIG.historyLimit),
    relay,
  };
}
