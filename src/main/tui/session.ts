/**
 * Interactive chat session
 *
 * Owns the lifecycle: check the terminal, connect, subscribe to our inbox,
 * run the chat loop, tear down. The secret key is wiped on every path out.
 */

import chalk from 'chalk';
import { ConnectionPhase, ExitCode } from '../../shared/types';
import { CommandInterpreter } from '../whisper/commands';
import { ConnectionStateTracker, isAbortError } from '../whisper/connection-state';
import { formatShortNpub, GIFT_WRAP_KIND, NostrKeypair, parseIdentity } from '../whisper/crypto';
import { toErrorMessage, WhisperError } from '../whisper/errors';
import { ingestEvent } from '../whisper/ingestion';
import { DEFAULT_HISTORY_LIMIT, MessageStore } from '../whisper/message-store';
import { isSecureRelayUrl, RelayCallbacks, RelayConnection, RelayLink, Subscription } from '../whisper/relay-connection';
import { withKeypair } from '../whisper/key-loader';
import { log } from '../logging';
import { ChatLoop } from './chat-loop';
import { NodeTerminal, Terminal } from './terminal';
import { ViewState } from './view-state';

const MAX_NOTICE_LENGTH = 50;
export const INVALID_RECIPIENT_STATUS = 'Invalid recipient. Use /to <npub>';

export interface ChatSessionOptions {
  relayUrl: string;
  /** npub or hex; invalid values start the session without a recipient. */
  recipient?: string;
  keypair: NostrKeypair;
  timeoutMs: number;
  historyLimit?: number;
  signal?: AbortSignal;
}

export interface ChatSessionDeps {
  terminal?: Terminal;
  createRelay?: (url: string, callbacks: RelayCallbacks) => RelayLink;
  palette?: chalk.Chalk;
  /** Where fatal errors are reported once the terminal is released. */
  reportError?: (message: string) => void;
  pollTimeoutMs?: number;
}

function statusForPhase(phase: ConnectionPhase): string {
  switch (phase) {
    case 'connected':
      return 'Connected';
    case 'connecting':
      return 'Connecting...';
    case 'error':
      return 'Connection error';
    case 'disconnected':
      return 'Disconnected';
  }
}

/**
 * Runs the interactive session until /quit, Ctrl+Q, Ctrl+C, the abort signal
 * or a dropped connection.
 *
 * CONTRACT:
 *   Outputs:
 *     - ExitCode.Ok after a normal session, including one ended by a disconnect
 *       or cancelled while connecting
 *     - InvalidArgs when no terminal is available
 *     - RelayError / Timeout when the initial connect or subscribe fails
 *
 *   Invariants:
 *     - keypair.secretKey is zeroed before the returned promise settles
 *     - Teardown order: subscription, relay, store, terminal
 *     - Fatal errors are reported after the terminal is released
 */
export async function runChatSession(options: ChatSessionOptions, deps: ChatSessionDeps = {}): Promise<ExitCode> {
  const reportError = deps.reportError ?? ((message: string) => process.stderr.write(`Error: ${message}\n`));

  return withKeypair(options.keypair, async (keypair) => {
    try {
      await runSession(options, keypair, deps);
      return ExitCode.Ok;
    } catch (error) {
      if (isAbortError(error)) {
        log('info', 'Chat session cancelled before start');
        return ExitCode.Ok;
      }
      const message = toErrorMessage(error);
      log('error', `Chat session failed: ${message}`);
      reportError(message);
      return error instanceof WhisperError ? error.exitCode : ExitCode.RelayError;
    }
  });
}

async function runSession(options: ChatSessionOptions, keypair: NostrKeypair, deps: ChatSessionDeps): Promise<void> {
  const terminal = deps.terminal ?? new NodeTerminal();
  if (!terminal.isAvailable()) {
    throw new WhisperError('Interactive mode requires a terminal (use send/recv for pipes)', ExitCode.InvalidArgs);
  }

  let initialRecipient: string | undefined;
  if (options.recipient !== undefined) {
    initialRecipient = parseIdentity(options.recipient) ?? undefined;
    if (initialRecipient === undefined) {
      log('warn', 'Invalid recipient given; starting without one');
    }
  }

  const store = new MessageStore(options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
  const view = new ViewState();
  const tracker = new ConnectionStateTracker();

  tracker.onPhaseChange((phase) => {
    view.setStatus(statusForPhase(phase));
  });

  const createRelay =
    deps.createRelay ??
    ((url: string, callbacks: RelayCallbacks) =>
      new RelayConnection(url, callbacks, {
        connectionTimeoutMs: options.timeoutMs,
        publishTimeoutMs: options.timeoutMs,
      }));
  const relay = createRelay(options.relayUrl, {
    onPhaseChange: (phase) => tracker.setPhase(phase),
    onNotice: (message) => view.setStatus(`Notice: ${message.slice(0, MAX_NOTICE_LENGTH)}`),
  });

  let subscription: Subscription | null = null;
  let terminalOpen = false;

  try {
    relay.open();
    await tracker.waitForConnected(options.timeoutMs, options.signal);

    const interpreter = new CommandInterpreter(
      {
        store,
        connection: tracker,
        relay,
        secretKey: keypair.secretKey,
        setStatus: (text) => view.setStatus(text),
        requestQuit: () => view.requestQuit(),
      },
      initialRecipient
    );

    try {
      subscription = relay.subscribe(
        { kinds: [GIFT_WRAP_KIND], '#p': [keypair.pubkeyHex] },
        {
          onEvent: (event) => {
            ingestEvent(event, {
              store,
              secretKey: keypair.secretKey,
              getRecipient: () => interpreter.recipient,
              reportStatus: (text) => view.setStatus(text),
            });
          },
          onEose: () => view.setStatus('Ready'),
        }
      );
    } catch (error) {
      throw new WhisperError(
        `Failed to subscribe: ${toErrorMessage(error)}`,
        ExitCode.RelayError,
        error instanceof Error ? error : undefined
      );
    }

    try {
      terminal.open();
      terminalOpen = true;
    } catch (error) {
      throw new WhisperError(
        `Failed to initialize terminal: ${toErrorMessage(error)}`,
        ExitCode.InvalidArgs,
        error instanceof Error ? error : undefined
      );
    }

    if (!isSecureRelayUrl(options.relayUrl)) {
      view.setStatus('Warning: insecure relay (not wss://)');
    }
    if (options.recipient !== undefined && initialRecipient === undefined) {
      view.setStatus(INVALID_RECIPIENT_STATUS);
    }

    const loop = new ChatLoop({
      terminal,
      store,
      connection: tracker,
      view,
      submit: (line) => {
        interpreter.handleLine(line);
      },
      identityLabel: formatShortNpub(keypair.pubkeyHex),
      recipientLabel: () => {
        const recipient = interpreter.recipient;
        return recipient === undefined ? undefined : formatShortNpub(recipient);
      },
      signal: options.signal,
      palette: deps.palette,
      pollTimeoutMs: deps.pollTimeoutMs,
    });

    log('info', `Chat session started on ${relay.url}`);
    await loop.run();
  } finally {
    if (subscription && tracker.isConnected) {
      subscription.close();
    }
    relay.close();
    store.clear();
    if (terminalOpen) {
      terminal.close();
    }
    log('info', 'Chat session ended');
  }
}
