/**
 * One-shot send: stdin -> gift wrapped DM -> relay
 */

import { ExitCode } from '../../shared/types';
import { ConnectionStateTracker } from './connection-state';
import { NostrEvent, NostrKeypair, parseIdentity, wrapDirectMessage } from './crypto';
import { toErrorMessage, WhisperError } from './errors';
import { MAX_CONTENT_BYTES } from './message-store';
import { isPublishTimeout, RelayCallbacks, RelayConnection, RelayLink } from './relay-connection';
import { log } from '../logging';

export interface SendOptions {
  relayUrl: string;
  recipient: string;
  keypair: NostrKeypair;
  timeoutMs: number;
  subject?: string;
  replyTo?: string;
  signal?: AbortSignal;
}

export interface SendDeps {
  readMessage?: () => Promise<string>;
  createRelay?: (url: string, callbacks: RelayCallbacks, timeoutMs: number) => RelayLink;
  warn?: (message: string) => void;
}

export interface SendResult {
  eventId: string;
  acknowledged: boolean;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new Error('Unexpected chunk type on input stream');
}

/**
 * Reads the whole message from a stream, rejecting input over 64 KiB.
 * Trailing CR/LF is removed.
 */
export async function readMessageInput(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of stream) {
    const buffer = toBuffer(chunk);
    total += buffer.length;
    if (total > MAX_CONTENT_BYTES) {
      throw new WhisperError(`Message too large (max ${MAX_CONTENT_BYTES} bytes)`, ExitCode.InvalidArgs);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString('utf8').replace(/[\r\n]+$/, '');
}

function defaultCreateRelay(url: string, callbacks: RelayCallbacks, timeoutMs: number): RelayLink {
  return new RelayConnection(url, callbacks, { connectionTimeoutMs: timeoutMs, publishTimeoutMs: timeoutMs });
}

/**
 * CONTRACT:
 *   Outputs:
 *     - The wrap event id, and whether the relay acknowledged it in time
 *
 *   Errors (WhisperError):
 *     - InvalidArgs: bad recipient, empty or oversize message
 *     - CryptoError: wrapping failed
 *     - RelayError: connect failure, publish refused
 *     - Timeout: no connection within timeoutMs
 *
 *   Invariants:
 *     - A missing OK is only a warning; the event may still be delivered
 *     - The relay is closed on every path out
 */
export async function sendDirectMessage(options: SendOptions, deps: SendDeps = {}): Promise<SendResult> {
  const warn = deps.warn ?? ((message: string) => process.stderr.write(`Warning: ${message}\n`));

  const recipient = parseIdentity(options.recipient);
  if (!recipient) {
    throw new WhisperError('Invalid recipient (expected npub or 64-char hex)', ExitCode.InvalidArgs);
  }

  const content = await (deps.readMessage ?? readMessageInput)();
  if (content.length === 0) {
    throw new WhisperError('Empty message', ExitCode.InvalidArgs);
  }

  let event: NostrEvent;
  try {
    event = wrapDirectMessage(content, options.keypair.secretKey, recipient, {
      subject: options.subject,
      replyTo: options.replyTo,
    });
  } catch (error) {
    throw new WhisperError(
      `Failed to create DM: ${toErrorMessage(error)}`,
      ExitCode.CryptoError,
      error instanceof Error ? error : undefined
    );
  }

  const tracker = new ConnectionStateTracker();
  const relay = (deps.createRelay ?? defaultCreateRelay)(
    options.relayUrl,
    { onPhaseChange: (phase) => tracker.setPhase(phase) },
    options.timeoutMs
  );

  try {
    relay.open();
    await tracker.waitForConnected(options.timeoutMs, options.signal);

    let acknowledgement: Promise<string>;
    try {
      acknowledgement = relay.publish(event);
    } catch (error) {
      throw new WhisperError(`Failed to publish: ${toErrorMessage(error)}`, ExitCode.RelayError);
    }

    try {
      await acknowledgement;
      log('info', `Sent ${event.id.slice(0, 8)}... to ${recipient.slice(0, 8)}...`);
      return { eventId: event.id, acknowledged: true };
    } catch (error) {
      if (isPublishTimeout(error)) {
        warn('No OK from relay (message may still be delivered)');
        return { eventId: event.id, acknowledged: false };
      }
      throw new WhisperError(`Relay rejected message: ${toErrorMessage(error)}`, ExitCode.RelayError);
    }
  } finally {
    relay.close();
  }
}
