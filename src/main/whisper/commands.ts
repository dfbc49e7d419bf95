/**
 * Chat input interpretation
 *
 * A submitted line is either a slash command or outgoing message text.
 * Every outcome other than /quit is reported as status text; nothing here
 * ends the session on error.
 */

import { ChatMessage } from '../../shared/types';
import { ConnectionStateTracker } from './connection-state';
import { NostrEvent, parseIdentity, wrapDirectMessage } from './crypto';
import { toErrorMessage } from './errors';
import { MessageStore } from './message-store';
import { RelayLink } from './relay-connection';
import { stripControlChars } from './sanitize';
import { log } from '../logging';

export const HELP_TEXT = '/to <npub> /clear /quit';

export type Command =
  | { type: 'empty' }
  | { type: 'to'; address: string }
  | { type: 'clear' }
  | { type: 'quit' }
  | { type: 'help' }
  | { type: 'unknown'; text: string }
  | { type: 'message'; text: string };

/**
 * Classifies a line of user input. The line is trimmed first.
 */
export function parseCommand(line: string): Command {
  const text = line.trim();

  if (text.length === 0) {
    return { type: 'empty' };
  }
  if (!text.startsWith('/')) {
    return { type: 'message', text };
  }

  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(text);
  const name = match ? match[1] : text;
  const argument = match?.[2]?.trim() ?? '';

  switch (name) {
    case '/to':
      return { type: 'to', address: argument };
    case '/clear':
      return argument.length === 0 ? { type: 'clear' } : { type: 'unknown', text };
    case '/quit':
    case '/q':
      return argument.length === 0 ? { type: 'quit' } : { type: 'unknown', text };
    case '/help':
      return { type: 'help' };
    default:
      return { type: 'unknown', text };
  }
}

export interface CommandContext {
  store: MessageStore;
  connection: ConnectionStateTracker;
  relay: Pick<RelayLink, 'publish'>;
  secretKey: Uint8Array;
  setStatus: (text: string) => void;
  requestQuit: () => void;
  wrap?: (content: string, secretKey: Uint8Array, recipientPubkeyHex: string) => NostrEvent;
  now?: () => number;
}

/**
 * Holds the active recipient and applies commands against the session.
 *
 * CONTRACT:
 *   Invariants:
 *     - The recipient only changes on a successful /to, which also clears the store
 *     - A message is published only with a recipient set and the phase 'connected'
 *     - The outgoing echo is inserted once the relay accepted the event for
 *       sending; it never waits for the relay's OK
 */
export class CommandInterpreter {
  private activeRecipient: string | undefined;

  constructor(private readonly context: CommandContext, initialRecipient?: string) {
    this.activeRecipient = initialRecipient;
  }

  get recipient(): string | undefined {
    return this.activeRecipient;
  }

  handleLine(line: string): Command {
    const command = parseCommand(line);

    switch (command.type) {
      case 'empty':
        break;
      case 'quit':
        this.context.requestQuit();
        break;
      case 'clear':
        this.context.store.clear();
        break;
      case 'to':
        this.changeRecipient(command.address);
        break;
      case 'help':
        this.context.setStatus(HELP_TEXT);
        break;
      case 'unknown':
        this.context.setStatus(`Unknown: ${stripControlChars(command.text) ?? ''}`);
        break;
      case 'message':
        this.send(command.text);
        break;
    }

    return command;
  }

  private changeRecipient(address: string): void {
    const recipient = parseIdentity(address);
    if (!recipient) {
      this.context.setStatus('Invalid npub');
      return;
    }
    this.activeRecipient = recipient;
    this.context.store.clear();
    this.context.setStatus('Recipient set');
    log('info', `Active recipient changed to ${recipient.slice(0, 8)}...`);
  }

  private send(text: string): void {
    const recipient = this.activeRecipient;
    if (recipient === undefined) {
      this.context.setStatus('No recipient. Use /to <npub>');
      return;
    }
    if (!this.context.connection.isConnected) {
      this.context.setStatus('Not connected');
      return;
    }

    const wrap = this.context.wrap ?? wrapDirectMessage;
    let event: NostrEvent;
    try {
      event = wrap(text, this.context.secretKey, recipient);
    } catch (error) {
      log('error', `Failed to create DM: ${toErrorMessage(error)}`);
      this.context.setStatus('Failed to create DM');
      return;
    }

    let acknowledgement: Promise<string>;
    try {
      acknowledgement = this.context.relay.publish(event);
    } catch (error) {
      log('warn', `Send failed: ${toErrorMessage(error)}`);
      this.context.setStatus('Send failed');
      return;
    }

    const now = this.context.now ?? (() => Math.floor(Date.now() / 1000));
    const echo: ChatMessage = {
      senderLabel: '',
      content: stripControlChars(text) ?? '',
      timestamp: now(),
      isOutgoing: true,
    };
    if (!this.context.store.insert(echo)) {
      log('warn', 'Outgoing echo dropped');
    }
    this.context.setStatus('Sending...');

    acknowledgement.then(
      () => this.context.setStatus('Sent'),
      (error: unknown) => this.context.setStatus(`Send failed: ${toErrorMessage(error)}`)
    );
  }
}
