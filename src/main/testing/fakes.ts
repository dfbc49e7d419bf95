/**
 * In-process stand-ins for the relay and the terminal, used by tests.
 */

import type { NostrEvent } from '../whisper/crypto';
import { Filter, RelayCallbacks, RelayLink, Subscription, SubscriptionHandlers } from '../whisper/relay-connection';
import { KeyPress, Terminal } from '../tui/terminal';

export type ConnectOutcome = 'connected' | 'error' | 'hang';

export interface FakeSubscription {
  filter: Filter;
  handlers: SubscriptionHandlers;
  closed: boolean;
}

export class FakeRelay implements RelayLink {
  readonly url: string;
  connectOutcome: ConnectOutcome = 'connected';
  failSubscribe = false;
  respond: (event: NostrEvent) => Promise<string> = () => Promise.resolve('');
  opened = false;
  closed = false;
  connected = false;
  readonly subscriptions: FakeSubscription[] = [];
  readonly published: NostrEvent[] = [];

  constructor(url: string, private readonly callbacks: RelayCallbacks) {
    this.url = url;
  }

  open(): void {
    this.opened = true;
    this.callbacks.onPhaseChange('connecting');
    if (this.connectOutcome === 'connected') {
      this.connected = true;
      this.callbacks.onPhaseChange('connected');
    } else if (this.connectOutcome === 'error') {
      this.callbacks.onPhaseChange('error');
    }
  }

  subscribe(filter: Filter, handlers: SubscriptionHandlers): Subscription {
    if (this.failSubscribe) {
      throw new Error('subscription refused');
    }
    const entry: FakeSubscription = { filter, handlers, closed: false };
    this.subscriptions.push(entry);
    return {
      close: () => {
        entry.closed = true;
      },
    };
  }

  publish(event: NostrEvent): Promise<string> {
    if (!this.connected) {
      throw new Error('Not connected');
    }
    this.published.push(event);
    return this.respond(event);
  }

  close(): void {
    this.closed = true;
    this.connected = false;
  }

  deliver(event: NostrEvent): void {
    for (const entry of this.subscriptions) {
      if (!entry.closed) {
        entry.handlers.onEvent(event);
      }
    }
  }

  endOfStoredEvents(): void {
    for (const entry of this.subscriptions) {
      entry.handlers.onEose?.();
    }
  }

  notice(message: string): void {
    this.callbacks.onNotice?.(message);
  }

  drop(): void {
    this.connected = false;
    this.callbacks.onPhaseChange('disconnected');
  }
}

/**
 * Collects the relays a factory created so tests can drive them.
 */
export function fakeRelayFactory(configure: (relay: FakeRelay) => void = () => undefined) {
  const created: FakeRelay[] = [];
  const create = (url: string, callbacks: RelayCallbacks): FakeRelay => {
    const relay = new FakeRelay(url, callbacks);
    configure(relay);
    created.push(relay);
    return relay;
  };
  return { create, created };
}

export function key(name: string, modifiers: Partial<Omit<KeyPress, 'name'>> = {}): KeyPress {
  return { name, sequence: modifiers.sequence ?? '', ctrl: false, meta: false, shift: false, ...modifiers };
}

export function charKey(char: string): KeyPress {
  return { name: /^[a-z]$/.test(char) ? char : undefined, sequence: char, ctrl: false, meta: false, shift: false };
}

const MAX_POLLS = 10000;

/**
 * Terminal with scripted input. readKey hands out queued keys, and calls
 * onPoll first so a test can act at a given poll.
 */
export class FakeTerminal implements Terminal {
  rows = 12;
  columns = 80;
  available = true;
  opened = false;
  closed = false;
  failOpen = false;
  polls = 0;
  onPoll: (poll: number) => void = () => undefined;
  readonly frames: string[] = [];
  private readonly keys: KeyPress[] = [];
  private readonly resizeCallbacks: Array<() => void> = [];

  isAvailable(): boolean {
    return this.available;
  }

  open(): void {
    if (this.failOpen) {
      throw new Error('no tty');
    }
    this.opened = true;
  }

  async readKey(): Promise<KeyPress | null> {
    await Promise.resolve();
    this.polls++;
    if (this.polls > MAX_POLLS) {
      throw new Error('FakeTerminal: loop did not terminate');
    }
    this.onPoll(this.polls);
    return this.keys.shift() ?? null;
  }

  write(data: string): void {
    this.frames.push(data);
  }

  onResize(callback: () => void): void {
    this.resizeCallbacks.push(callback);
  }

  close(): void {
    this.closed = true;
  }

  press(...keys: KeyPress[]): void {
    this.keys.push(...keys);
  }

  type(text: string): void {
    this.press(...Array.from(text).map(charKey), key('return', { sequence: '\r' }));
  }

  resize(rows: number, columns: number): void {
    this.rows = rows;
    this.columns = columns;
    for (const callback of this.resizeCallbacks) {
      callback();
    }
  }

  get lastFrame(): string {
    return this.frames[this.frames.length - 1] ?? '';
  }
}
