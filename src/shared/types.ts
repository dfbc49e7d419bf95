export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
}

export interface AppConfig {
  logLevel: LogLevel;
  timeoutMs: number; // Relay connect / OK wait
  relay?: string; // Default relay when --relay is omitted
  historyLimit: number; // Message store capacity for the chat view
}

/**
 * Process exit codes shared by every mode.
 */
export const ExitCode = {
  Ok: 0,
  InvalidArgs: 1,
  KeyError: 2,
  RelayError: 3,
  CryptoError: 4,
  Timeout: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type ConnectionPhase = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface ChatMessage {
  senderLabel: string; // Short npub for incoming, empty for outgoing
  content: string; // Control characters already stripped
  timestamp: number; // Unix seconds
  isOutgoing: boolean;
}
