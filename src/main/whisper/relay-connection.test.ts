import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { ConnectionPhase } from '../../shared/types';
import type { NostrEvent } from './crypto';
import {
  Filter,
  isConnectTimeout,
  isPublishTimeout,
  isSecureRelayUrl,
  normalizeRelayUrl,
  RelayConnection,
  RELAY_CLOSED_MESSAGE,
  RelayPoolApi,
} from './relay-connection';

jest.mock('../logging', () => ({
  log: jest.fn(),
}));

const URL = 'wss://relay.example.com';
const NORMALIZED = 'wss://relay.example.com/';

type RelayHandle = { onnotice: (message: string) => void; onclose: (() => void) | null };
type SubscribeParams = { onevent?: (event: NostrEvent) => void; oneose?: () => void };

class FakePool implements RelayPoolApi {
  relay: RelayHandle = { onnotice: () => undefined, onclose: null };
  connectResult: Promise<RelayHandle> = Promise.resolve(this.relay);
  connected = new Map<string, boolean>();
  subscriptions: Array<{ relays: string[]; filter: Filter; params: SubscribeParams; close: jest.Mock<() => void> }> = [];
  publishResults: Promise<string>[] = [Promise.resolve('')];
  published: NostrEvent[] = [];
  closed: string[][] = [];
  poolOnClose = jest.fn<() => void>();

  ensureRelay = jest.fn((url: string) => {
    this.connected.set(url, true);
    this.relay.onclose = this.poolOnClose;
    return this.connectResult;
  });

  subscribe(relays: string[], filter: Filter, params: SubscribeParams) {
    const entry = { relays, filter, params, close: jest.fn<() => void>() };
    this.subscriptions.push(entry);
    return { close: entry.close };
  }

  publish(_relays: string[], event: NostrEvent): Promise<string>[] {
    this.published.push(event);
    return this.publishResults;
  }

  close(relays: string[]): void {
    this.closed.push(relays);
  }

  listConnectionStatus(): Map<string, boolean> {
    return this.connected;
  }
}

function createMockEvent(): NostrEvent {
  return { id: 'a'.repeat(64), kind: 1059, pubkey: 'b'.repeat(64), created_at: 1, tags: [], content: 'x', sig: 'c'.repeat(128) };
}

describe('relay url helpers', () => {
  it('adds the trailing slash SimplePool uses as its key', () => {
    expect(normalizeRelayUrl(' wss://relay.example.com ')).toBe(NORMALIZED);
    expect(normalizeRelayUrl(NORMALIZED)).toBe(NORMALIZED);
  });

  it('treats only wss:// as secure', () => {
    expect(isSecureRelayUrl('wss://relay.example.com')).toBe(true);
    expect(isSecureRelayUrl('WSS://relay.example.com')).toBe(true);
    expect(isSecureRelayUrl('ws://localhost:7777')).toBe(false);
  });

  it('recognises acknowledgement timeouts', () => {
    expect(isPublishTimeout(new Error('Timeout'))).toBe(true);
    expect(isPublishTimeout(new Error('publish timed out'))).toBe(true);
    expect(isPublishTimeout(new Error('blocked: spam'))).toBe(false);
  });

  it('tells a connect timeout apart from a refusal', () => {
    expect(isConnectTimeout(new Error('connection timed out'))).toBe(true);
    expect(isConnectTimeout(new Error('ECONNREFUSED'))).toBe(false);
  });
});

describe('RelayConnection', () => {
  let fake: FakePool;
  let phases: ConnectionPhase[];
  let notices: string[];
  let connection: RelayConnection;

  async function openConnected(): Promise<void> {
    connection.open();
    await jest.advanceTimersByTimeAsync(0);
  }

  beforeEach(() => {
    jest.useFakeTimers();
    fake = new FakePool();
    phases = [];
    notices = [];
    connection = new RelayConnection(
      URL,
      { onPhaseChange: (phase) => phases.push(phase), onNotice: (message) => notices.push(message) },
      { pool: fake, publishTimeoutMs: 5000, statusCheckIntervalMs: 2000 }
    );
  });

  afterEach(() => {
    connection.close();
    jest.clearAllTimers();
    jest.useRealTimers();
  });

  describe('open', () => {
    it('reports connecting then connected', async () => {
      await openConnected();

      expect(fake.ensureRelay).toHaveBeenCalledWith(NORMALIZED, { connectionTimeout: 5000 });
      expect(phases).toEqual(['connecting', 'connected']);
    });

    it('reports error when the connection attempt fails', async () => {
      fake.connectResult = Promise.reject(new Error('ECONNREFUSED'));

      await openConnected();

      expect(phases).toEqual(['connecting', 'error']);
    });

    it('stays connecting when the pool gives up waiting for an answer', async () => {
      fake.connectResult = Promise.reject(new Error('connection timed out'));

      await openConnected();

      expect(phases).toEqual(['connecting']);
    });

    it('forwards relay notices', async () => {
      await openConnected();

      fake.relay.onnotice('slow down');

      expect(notices).toEqual(['slow down']);
    });

    it('reports disconnected when the relay closes, after the pool handler', async () => {
      await openConnected();

      fake.relay.onclose?.();

      expect(fake.poolOnClose).toHaveBeenCalledTimes(1);
      expect(phases).toEqual(['connecting', 'connected', 'disconnected']);
    });

    it('detects a silent drop through the status poll', async () => {
      await openConnected();

      fake.connected.set(NORMALIZED, false);
      await jest.advanceTimersByTimeAsync(2000);

      expect(phases).toEqual(['connecting', 'connected', 'disconnected']);
    });
  });

  describe('subscribe', () => {
    it('refuses to subscribe before connecting', () => {
      expect(() => connection.subscribe({ kinds: [1059] }, { onEvent: jest.fn() })).toThrow(
        'Cannot subscribe: relay wss://relay.example.com/ is disconnected'
      );
    });

    it('passes the filter through and delivers events and EOSE', async () => {
      await openConnected();
      const onEvent = jest.fn();
      const onEose = jest.fn();

      const subscription = connection.subscribe({ kinds: [1059], '#p': ['d'.repeat(64)] }, { onEvent, onEose });
      const [entry] = fake.subscriptions;
      const event = createMockEvent();
      entry.params.onevent?.(event);
      entry.params.oneose?.();

      expect(entry.relays).toEqual([NORMALIZED]);
      expect(entry.filter).toEqual({ kinds: [1059], '#p': ['d'.repeat(64)] });
      expect(onEvent).toHaveBeenCalledWith(event);
      expect(onEose).toHaveBeenCalledTimes(1);

      subscription.close();
      expect(entry.close).toHaveBeenCalledTimes(1);
    });

    it('stops delivering after close', async () => {
      await openConnected();
      const onEvent = jest.fn();
      connection.subscribe({ kinds: [1059] }, { onEvent });
      const [entry] = fake.subscriptions;

      connection.close();
      entry.params.onevent?.(createMockEvent());

      expect(onEvent).not.toHaveBeenCalled();
      expect(entry.close).toHaveBeenCalledTimes(1);
      expect(fake.closed).toEqual([[NORMALIZED]]);
    });
  });

  describe('publish', () => {
    it('throws synchronously when not connected', () => {
      expect(() => connection.publish(createMockEvent())).toThrow('Not connected');
    });

    it('resolves with the relay OK message', async () => {
      fake.publishResults = [Promise.resolve('duplicate: already have it')];
      await openConnected();

      await expect(connection.publish(createMockEvent())).resolves.toBe('duplicate: already have it');
      expect(fake.published).toHaveLength(1);
    });

    it('rejects with the relay refusal', async () => {
      await openConnected();
      fake.publishResults = [Promise.reject(new Error('blocked: not allowed'))];

      await expect(connection.publish(createMockEvent())).rejects.toThrow('blocked: not allowed');
    });

    it('rejects with Timeout when no OK arrives', async () => {
      fake.publishResults = [new Promise<string>(() => undefined)];
      await openConnected();

      const settled = connection.publish(createMockEvent()).catch((error: unknown) => error);
      await jest.advanceTimersByTimeAsync(5000);

      const error = await settled;
      expect(isPublishTimeout(error)).toBe(true);
    });
  });

  describe('close', () => {
    it('rejects a pending acknowledgement and leaves no timer behind', async () => {
      fake.publishResults = [new Promise<string>(() => undefined)];
      await openConnected();

      const settled = connection.publish(createMockEvent()).catch((error: unknown) => error);
      connection.close();

      const error = await settled;
      expect(error).toEqual(new Error(RELAY_CLOSED_MESSAGE));
      expect(isPublishTimeout(error)).toBe(false);
      expect(jest.getTimerCount()).toBe(0);
    });

    it('is idempotent and silences later callbacks', async () => {
      await openConnected();

      connection.close();
      connection.close();
      fake.relay.onclose?.();

      expect(fake.closed).toHaveLength(1);
      expect(phases).toEqual(['connecting', 'connected']);
    });
  });
});
