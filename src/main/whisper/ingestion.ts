/**
 * Incoming gift wrap ingestion for the chat view
 *
 * Runs inside relay callbacks. Nothing here throws back into the relay
 * layer or the render loop: every failure becomes a dropped event (logged) or
 * status text.
 */

import { ChatMessage } from '../../shared/types';
import { DirectMessage, formatShortNpub, NostrEvent, unwrapDirectMessage } from './crypto';
import { toErrorMessage } from './errors';
import { MessageStore } from './message-store';
import { stripControlChars } from './sanitize';
import { log } from '../logging';

export type Unwrapper = (wrap: NostrEvent, recipientSecretKey: Uint8Array) => DirectMessage | null;

export interface IngestionContext {
  store: MessageStore;
  secretKey: Uint8Array;
  /** Active peer as hex pubkey; undefined accepts every sender. */
  getRecipient: () => string | undefined;
  /** Advisory text for the status bar. */
  reportStatus?: (text: string) => void;
  unwrap?: Unwrapper;
  now?: () => number;
  formatSender?: (pubkeyHex: string) => string;
}

export type IngestOutcome = 'stored' | 'undecryptable' | 'filtered' | 'dropped';

/**
 * Builds an incoming chat record from an unwrapped message.
 */
export function toIncomingMessage(
  message: DirectMessage,
  now: () => number,
  formatSender: (pubkeyHex: string) => string = formatShortNpub
): ChatMessage {
  return {
    senderLabel: formatSender(message.senderPubkeyHex),
    content: stripControlChars(message.content) ?? '',
    timestamp: message.createdAt > 0 ? message.createdAt : now(),
    isOutgoing: false,
  };
}

/**
 * CONTRACT:
 *   Inputs:
 *     - event: raw event from the inbox subscription (expected kind 1059)
 *     - context: store, local secret key, recipient accessor
 *
 *   Outputs:
 *     - 'stored' when a record was inserted
 *     - 'undecryptable' when the event is not a DM this key can open
 *     - 'filtered' when a recipient is set and the sender differs
 *     - 'dropped' when the store refused the record or building it failed
 *
 *   Invariants:
 *     - The store only grows on 'stored'
 *     - Never throws
 */
export function ingestEvent(event: NostrEvent, context: IngestionContext): IngestOutcome {
  const unwrap = context.unwrap ?? unwrapDirectMessage;
  const now = context.now ?? (() => Math.floor(Date.now() / 1000));

  let message: DirectMessage | null;
  try {
    message = unwrap(event, context.secretKey);
  } catch (error) {
    log('debug', `[ingest] Unwrap threw for event ${event.id?.slice(0, 8)}...: ${toErrorMessage(error)}`);
    message = null;
  }

  if (!message) {
    log('debug', `[ingest] Ignoring event ${event.id?.slice(0, 8)}... (not a DM for this identity)`);
    return 'undecryptable';
  }

  const recipient = context.getRecipient();
  if (recipient !== undefined && message.senderPubkeyHex !== recipient) {
    log('debug', `[ingest] Ignoring DM from ${message.senderPubkeyHex.slice(0, 8)}... (not the active peer)`);
    return 'filtered';
  }

  try {
    const record = toIncomingMessage(message, now, context.formatSender);
    if (context.store.insert(record)) {
      return 'stored';
    }
  } catch (error) {
    log('warn', `[ingest] Failed to build message record: ${toErrorMessage(error)}`);
  }

  log('warn', `[ingest] Message from ${message.senderPubkeyHex.slice(0, 8)}... dropped`);
  context.reportStatus?.('Message dropped');
  return 'dropped';
}
