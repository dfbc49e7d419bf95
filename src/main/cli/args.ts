import { ExitCode } from '../../shared/types';
import { WhisperError } from '../whisper/errors';
import { KeySource } from '../whisper/key-loader';

export type CommandName = 'send' | 'recv' | 'tui' | 'help';

export interface CliArgs {
  command: CommandName;
  key: KeySource;
  relay?: string;
  to?: string;
  subject?: string;
  replyTo?: string;
  since?: number;
  limit?: number;
  json: boolean;
  timeoutMs?: number;
  verbose: boolean;
}

export const USAGE = `whisper - Encrypted Nostr DMs (NIP-17)

Usage:
  whisper send --to <npub> --relay <url> [key options]
  whisper recv --relay <url> [key options]
  whisper tui  --relay <url> [--to <npub>] [key options]

Key options (in order of priority):
  --keep-key <name>     Use key from keep vault (recommended)
  --nsec-file <path>    Read key from file
  --nsec <nsec|hex>     Key as argument (visible in history)
  NOSTR_NSEC env var    Fallback if no key option

Send options:
  --to <npub|hex>       Recipient public key
  --subject <text>      Optional subject
  --reply-to <id>       Reply to event ID

Recv options:
  --since <timestamp>   Only messages after timestamp
  --limit <n>           Max messages (0 = stream)
  --json                Output JSON lines

Common options:
  --relay <url>         Relay URL (default: relay from config.yaml)
  --timeout <ms>        Connect/acknowledge timeout (default: 5000)
  --verbose             Echo log lines to stderr (send/recv)
  -h, --help            Show this help

Examples:
  echo "hello" | whisper send --to npub1... --keep-key main --relay wss://relay.example.com
  whisper recv --relay wss://relay.example.com --json
  whisper tui --relay wss://relay.example.com --to npub1...
`;

const COMMANDS: ReadonlySet<string> = new Set(['send', 'recv', 'tui']);

function invalid(message: string): WhisperError {
  return new WhisperError(message, ExitCode.InvalidArgs);
}

function parseNonNegativeInteger(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw invalid(`${flag} expects a non-negative integer, got '${value}'`);
  }
  return Number.parseInt(value, 10);
}

function isCommandName(value: string): value is 'send' | 'recv' | 'tui' {
  return COMMANDS.has(value);
}

/**
 * Parses argv (without the node and script entries).
 *
 * Flags take their value as the next argument or after '='.
 *
 * @throws WhisperError with ExitCode.InvalidArgs for unknown commands or flags,
 *         missing values and malformed numbers
 */
export function parseArgs(argv: string[]): CliArgs {
  const [first, ...rest] = argv;

  if (first === undefined) {
    throw invalid('No command given');
  }
  if (first === 'help' || first === '--help' || first === '-h') {
    return { command: 'help', key: {}, json: false, verbose: false };
  }
  if (!isCommandName(first)) {
    throw invalid(`Unknown command '${first}'`);
  }

  const args: CliArgs = { command: first, key: {}, json: false, verbose: false };

  for (let i = 0; i < rest.length; i++) {
    const raw = rest[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const flag = eq > 0 ? raw.slice(0, eq) : raw;
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) {
        return inline;
      }
      const next = rest[i + 1];
      if (next === undefined) {
        throw invalid(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--to':
        args.to = value();
        break;
      case '--nsec':
        args.key.nsec = value();
        break;
      case '--nsec-file':
        args.key.nsecFile = value();
        break;
      case '--keep-key':
        args.key.keepKey = value();
        break;
      case '--relay':
        args.relay = value();
        break;
      case '--subject':
        args.subject = value();
        break;
      case '--reply-to':
        args.replyTo = value();
        break;
      case '--since':
        args.since = parseNonNegativeInteger(flag, value());
        break;
      case '--limit':
        args.limit = parseNonNegativeInteger(flag, value());
        break;
      case '--timeout': {
        const timeout = parseNonNegativeInteger(flag, value());
        if (timeout === 0) {
          throw invalid('--timeout must be greater than 0');
        }
        args.timeoutMs = timeout;
        break;
      }
      case '--json':
        args.json = true;
        break;
      case '--verbose':
        args.verbose = true;
        break;
      case '--help':
      case '-h':
        return { command: 'help', key: {}, json: false, verbose: false };
      default:
        throw invalid(`Unknown option '${raw}'`);
    }
  }

  return args;
}
