import YAML from 'yaml';
import { AppConfig } from '../shared/types';

/**
 * YAML Utilities
 *
 * Parsing with a result object instead of exceptions, and the commented
 * config.yaml written on first run.
 */

export interface YamlParseResult<T> {
  success: boolean;
  data?: T;
  error?: Error;
}

/**
 * parseYaml<T>(content: string): YamlParseResult<T>
 *
 * CONTRACT:
 *   Inputs:
 *     - content: string, YAML content to parse
 *
 *   Outputs:
 *     - success case: { success: true, data: parsed_value }
 *     - failure case: { success: false, error: Error_object }
 *
 *   Invariants:
 *     - Exactly one of data or error is defined
 *     - Empty string input is valid YAML (parses to null)
 *     - Never throws
 *
 * The caller validates the shape of data.
 */
export function parseYaml<T>(content: string): YamlParseResult<T> {
  try {
    const data: T = YAML.parse(content);
    return { success: true, data };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error))
    };
  }
}

/**
 * Builds config.yaml with a comment above each field.
 * Output parses back to the same values.
 */
export function buildAppConfigYaml(config: AppConfig): string {
  const lines: string[] = [];

  lines.push('# whisper-dm configuration (YAML format)');
  lines.push('');
  lines.push('# Log level: debug, info, warn, error');
  lines.push(`logLevel: ${config.logLevel}`);
  lines.push('');
  lines.push('# Relay connection and publish acknowledgement timeout in milliseconds');
  lines.push(`timeoutMs: ${config.timeoutMs}`);
  lines.push('');
  lines.push('# Maximum number of messages kept in the chat view (oldest are evicted)');
  lines.push(`historyLimit: ${config.historyLimit}`);

  if (config.relay !== undefined) {
    lines.push('');
    lines.push('# Relay used when --relay is not given');
    lines.push(`relay: ${YAML.stringify(config.relay).trim()}`);
  }

  lines.push('');
  return lines.join('\n');
}
