import fs from 'fs';
import path from 'path';
import { LogEntry, LogLevel } from '../shared/types';
import { getUserDataPath } from './paths';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';
// Enabled by --verbose; never while the chat view owns the terminal
let echoToConsole = false;

export function getLogFilePath(): string {
  return path.join(getUserDataPath(), 'logs', 'whisper.log');
}

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function setLogEcho(enabled: boolean) {
  echoToConsole = enabled;
}

export function log(level: LogLevel, message: string) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }
  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
  };
  writeEntry(entry);
}

function writeEntry(entry: LogEntry) {
  const logFile = getLogFilePath();
  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    fs.appendFileSync(logFile, JSON.stringify(entry) + '\n');
  } catch (error) {
    if (echoToConsole) {
      console.error('Failed to write log', error);
    }
  }
  if (echoToConsole) {
    // stderr keeps stdout clean for piped `send` / `recv` output
    console.error(`[${entry.timestamp}] [${entry.level}] ${entry.message}`);
  }
}
