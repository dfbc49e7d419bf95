/**
 * One-shot receive: print DMs addressed to us until stopped
 */

import { ConnectionStateTracker } from './connection-state';
import { DirectMessage, GIFT_WRAP_KIND, hexToNpub, NostrKeypair, unwrapDirectMessage } from './crypto';
import { toErrorMessage, WhisperError } from './errors';
import { Filter, RelayCallbacks, RelayConnection, RelayLink, Subscription } from './relay-connection';
import { stripControlChars } from './sanitize';
import { log } from '../logging';
import { ExitCode } from '../../shared/types';

export interface ReceiveOptions {
  relayUrl: string;
  keypair: NostrKeypair;
  timeoutMs: number;
  since?: number;
  /** Stop after this many messages; 0 or undefined streams until stopped. */
  limit?: number;
  json?: boolean;
  signal?: AbortSignal;
}

export interface ReceiveDeps {
  createRelay?: (url: string, callbacks: RelayCallbacks, timeoutMs: number) => RelayLink;
  writeLine?: (line: string) => void;
  /** Relay NOTICE text; stderr by default so stdout stays machine-readable. */
  notice?: (message: string) => void;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM. */
export function formatDateTime(timestamp: number): string {
  const date = new Date(timestamp * 1000);
  if (Number.isNaN(date.getTime())) {
    return '(invalid time)';
  }
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  );
}

/**
 * One output line per message. JSON lines carry the full npub and the raw
 * content; the human form uses the short npub and stripped content.
 */
export function formatReceivedMessage(message: DirectMessage, json: boolean): string {
  const npub = hexToNpub(message.senderPubkeyHex);
  if (json) {
    return JSON.stringify({ from: npub, content: message.content, created_at: message.createdAt });
  }
  const content = stripControlChars(message.content) || '(empty)';
  return `${formatDateTime(message.createdAt)} ${npub.slice(0, 12)}... ${content}`;
}

function defaultCreateRelay(url: string, callbacks: RelayCallbacks, timeoutMs: number): RelayLink {
  return new RelayConnection(url, callbacks, { connectionTimeoutMs: timeoutMs, publishTimeoutMs: timeoutMs });
}

/**
 * Streams incoming DMs to writeLine. Resolves with the number printed once
 * the limit is reached, the signal fires, or the relay connection drops.
 *
 * @throws WhisperError (RelayError / Timeout) when connecting or subscribing fails
 */
export async function receiveMessages(options: ReceiveOptions, deps: ReceiveDeps = {}): Promise<number> {
  const writeLine = deps.writeLine ?? ((line: string) => process.stdout.write(`${line}\n`));
  const notice = deps.notice ?? ((message: string) => process.stderr.write(`Relay notice: ${message}\n`));
  const limit = options.limit ?? 0;
  const tracker = new ConnectionStateTracker();
  const relay = (deps.createRelay ?? defaultCreateRelay)(
    options.relayUrl,
    {
      onPhaseChange: (phase) => tracker.setPhase(phase),
      onNotice: (message) => notice(stripControlChars(message) ?? ''),
    },
    options.timeoutMs
  );

  let count = 0;
  let subscription: Subscription | null = null;
  let stop: () => void = () => undefined;
  const stopped = new Promise<void>((resolve) => {
    stop = resolve;
  });
  const onAbort = () => stop();

  try {
    relay.open();
    await tracker.waitForConnected(options.timeoutMs, options.signal);

    tracker.onPhaseChange((phase) => {
      if (phase !== 'connected') {
        log('warn', 'Relay connection lost');
        stop();
      }
    });
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const filter: Filter = { kinds: [GIFT_WRAP_KIND], '#p': [options.keypair.pubkeyHex] };
    if (options.since !== undefined && options.since > 0) {
      filter.since = options.since;
    }

    try {
      subscription = relay.subscribe(filter, {
        onEvent: (event) => {
          if (limit > 0 && count >= limit) {
            return;
          }
          const message = unwrapDirectMessage(event, options.keypair.secretKey);
          if (!message) {
            log('debug', `Ignoring event ${event.id.slice(0, 8)}... (not a DM for this identity)`);
            return;
          }
          count++;
          writeLine(formatReceivedMessage(message, options.json === true));
          if (limit > 0 && count >= limit) {
            stop();
          }
        },
      });
    } catch (error) {
      throw new WhisperError(`Failed to subscribe: ${toErrorMessage(error)}`, ExitCode.RelayError);
    }

    if (options.signal?.aborted) {
      stop();
    }
    await stopped;
    return count;
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
    if (subscription && tracker.isConnected) {
      subscription.close();
    }
    relay.close();
  }
}
