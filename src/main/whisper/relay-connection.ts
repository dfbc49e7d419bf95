/**
 * Single Nostr Relay Connection
 *
 * Wraps nostr-tools' SimplePool for one relay URL: connection phase reporting,
 * gift wrap subscription, publishing with acknowledgement, and teardown.
 *
 * There is no reconnection: a connection that drops after being established
 * ends the session that owns it.
 */

import { SimplePool } from 'nostr-tools';
import type { Event, Filter } from 'nostr-tools';
import { useWebSocketImplementation } from 'nostr-tools/pool';
import WebSocket from 'ws';
import { ConnectionPhase } from '../../shared/types';
import { NostrEvent } from './crypto';
import { toErrorMessage } from './errors';
import { log } from '../logging';

// nostr-tools needs an explicit WebSocket outside the browser
useWebSocketImplementation(WebSocket);

type SubCloser = {
  close: (reason?: string) => void;
};

/**
 * The slice of SimplePool this module uses. SimplePool satisfies it; tests
 * pass an in-process fake.
 */
export interface RelayPoolApi {
  ensureRelay(
    url: string,
    params?: { connectionTimeout?: number }
  ): Promise<{ onnotice: (message: string) => void; onclose: (() => void) | null }>;
  subscribe(
    relays: string[],
    filter: Filter,
    params: { onevent?: (event: Event) => void; oneose?: () => void }
  ): SubCloser;
  publish(relays: string[], event: Event): Promise<string>[];
  close(relays: string[]): void;
  listConnectionStatus(): Map<string, boolean>;
}

export type { Filter };

export interface Subscription {
  close(): void;
}

export interface SubscriptionHandlers {
  onEvent: (event: NostrEvent) => void;
  onEose?: () => void;
}

export interface RelayCallbacks {
  onPhaseChange: (phase: ConnectionPhase) => void;
  onNotice?: (message: string) => void;
}

/**
 * The transport surface the session modes depend on.
 */
export interface RelayLink {
  readonly url: string;
  /** Starts connecting; progress is reported through onPhaseChange only. */
  open(): void;
  subscribe(filter: Filter, handlers: SubscriptionHandlers): Subscription;
  /**
   * Throws synchronously when the event cannot be handed to the relay (not
   * connected). The returned promise resolves with the relay's OK message and
   * rejects on refusal or acknowledgement timeout.
   */
  publish(event: NostrEvent): Promise<string>;
  close(): void;
}

export interface RelayConnectionOptions {
  connectionTimeoutMs?: number;
  publishTimeoutMs?: number;
  statusCheckIntervalMs?: number;
  pool?: RelayPoolApi;
}

/**
 * Adds the trailing slash SimplePool uses as its connection key.
 */
export function normalizeRelayUrl(url: string): string {
  const trimmed = url.trim();
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}

export function isSecureRelayUrl(url: string): boolean {
  return url.trim().toLowerCase().startsWith('wss://');
}

export const PUBLISH_TIMEOUT_MESSAGE = 'Timeout';
export const RELAY_CLOSED_MESSAGE = 'Relay closed';

/**
 * True when the pool gave up on the connection attempt because its own
 * timer ran out, as opposed to the relay refusing it.
 */
export function isConnectTimeout(error: unknown): boolean {
  return /timed out/i.test(toErrorMessage(error));
}

/**
 * True when a publish rejected only because no OK arrived in time
 * (ours, or the pool's own acknowledgement timer).
 */
export function isPublishTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return typeof error === 'string' && /timed out/i.test(error);
  }
  return error.message === PUBLISH_TIMEOUT_MESSAGE || /timed out/i.test(error.message);
}

/**
 * CONTRACT:
 *   State:
 *     - phase: last phase reported through onPhaseChange
 *     - subscriptions: open subscription closers
 *
 *   Invariants:
 *     - Phase order: connecting -> (connected | error); connected -> disconnected
 *     - Callbacks are plain notifications; they run on relay events and must not block
 *     - No callback fires after close()
 *     - close() rejects acknowledgements still pending and leaves no timer running
 *     - A connect attempt that times out keeps the phase at 'connecting'
 *     - A drop is detected from the relay's close event, and from a status
 *       poll every 2s as a fallback
 */
export class RelayConnection implements RelayLink {
  readonly url: string;
  private pool: RelayPoolApi;
  private phase: ConnectionPhase = 'disconnected';
  private subscriptions: Map<number, SubCloser> = new Map();
  private nextSubscriptionId = 1;
  private statusCheckInterval: NodeJS.Timeout | null = null;
  private pendingAcknowledgements: Set<(error: Error) => void> = new Set();
  private closed = false;
  private readonly connectionTimeoutMs: number;
  private readonly publishTimeoutMs: number;
  private readonly statusCheckIntervalMs: number;

  constructor(
    url: string,
    private readonly callbacks: RelayCallbacks,
    options: RelayConnectionOptions = {}
  ) {
    this.url = normalizeRelayUrl(url);
    this.pool = options.pool ?? new SimplePool();
    this.connectionTimeoutMs = options.connectionTimeoutMs ?? 5000;
    this.publishTimeoutMs = options.publishTimeoutMs ?? 5000;
    this.statusCheckIntervalMs = options.statusCheckIntervalMs ?? 2000;
  }

  open(): void {
    if (this.closed) {
      return;
    }
    const startTime = Date.now();
    this.updatePhase('connecting');
    log('debug', `Relay ${this.url}: attempting connection...`);

    this.pool.ensureRelay(this.url, { connectionTimeout: this.connectionTimeoutMs }).then(
      (relay) => {
        if (this.closed) {
          return;
        }
        relay.onnotice = (message: string) => {
          log('info', `Relay ${this.url}: notice - ${message}`);
          this.callbacks.onNotice?.(message);
        };
        const poolOnClose = relay.onclose;
        relay.onclose = () => {
          poolOnClose?.();
          if (!this.closed && this.phase === 'connected') {
            log('warn', `Relay ${this.url}: connection closed`);
            this.updatePhase('disconnected');
          }
        };
        this.updatePhase('connected');
        log('info', `Relay ${this.url}: connected (${Date.now() - startTime}ms)`);
        this.startStatusMonitoring();
      },
      (error: unknown) => {
        if (this.closed) {
          return;
        }
        if (isConnectTimeout(error)) {
          // Still 'connecting': the caller's connect deadline reports the timeout
          log('warn', `Relay ${this.url}: no answer after ${Date.now() - startTime}ms`);
          return;
        }
        this.updatePhase('error');
        log('error', `Relay ${this.url}: connection failed after ${Date.now() - startTime}ms - ${toErrorMessage(error)}`);
      }
    );
  }

  subscribe(filter: Filter, handlers: SubscriptionHandlers): Subscription {
    if (this.phase !== 'connected') {
      throw new Error(`Cannot subscribe: relay ${this.url} is ${this.phase}`);
    }

    const id = this.nextSubscriptionId++;
    log('debug', `[subscribe] Subscription ${id} on ${this.url}: ${JSON.stringify(filter)}`);

    const sub = this.pool.subscribe([this.url], filter, {
      onevent: (event: Event) => {
        if (!this.closed) {
          handlers.onEvent(event);
        }
      },
      oneose: () => {
        if (!this.closed) {
          handlers.onEose?.();
        }
      },
    });
    this.subscriptions.set(id, sub);

    return {
      close: () => {
        const existing = this.subscriptions.get(id);
        if (existing) {
          existing.close();
          this.subscriptions.delete(id);
        }
      },
    };
  }

  publish(event: NostrEvent): Promise<string> {
    if (this.phase !== 'connected') {
      throw new Error('Not connected');
    }
    const [promise] = this.pool.publish([this.url], event);
    if (!promise) {
      throw new Error(`Relay ${this.url} did not accept the event`);
    }
    return this.awaitAcknowledgement(event, promise);
  }

  private async awaitAcknowledgement(event: NostrEvent, promise: Promise<string>): Promise<string> {
    let timer: NodeJS.Timeout | undefined;
    let cancel: ((error: Error) => void) | undefined;
    // A refusal arriving after the timeout has nobody left to report to
    promise.catch((error: unknown) => {
      log('debug', `Relay ${this.url}: late publish result - ${toErrorMessage(error)}`);
    });
    try {
      const message = await Promise.race([
        promise,
        new Promise<string>((_, reject) => {
          timer = setTimeout(() => reject(new Error(PUBLISH_TIMEOUT_MESSAGE)), this.publishTimeoutMs);
          cancel = reject;
          this.pendingAcknowledgements.add(reject);
        }),
      ]);
      log('debug', `Relay ${this.url}: publish succeeded for ${event.id.slice(0, 8)}...`);
      return message;
    } catch (error) {
      log('warn', `Relay ${this.url}: publish failed - ${toErrorMessage(error)}`);
      throw error;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      if (cancel) {
        this.pendingAcknowledgements.delete(cancel);
      }
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.statusCheckInterval) {
      clearInterval(this.statusCheckInterval);
      this.statusCheckInterval = null;
    }

    for (const sub of this.subscriptions.values()) {
      sub.close();
    }
    this.subscriptions.clear();

    for (const reject of this.pendingAcknowledgements) {
      reject(new Error(RELAY_CLOSED_MESSAGE));
    }
    this.pendingAcknowledgements.clear();

    this.pool.close([this.url]);
    this.phase = 'disconnected';
    log('debug', `Relay ${this.url}: closed`);
  }

  private updatePhase(phase: ConnectionPhase): void {
    if (this.phase === phase) {
      return;
    }
    this.phase = phase;
    this.callbacks.onPhaseChange(phase);
  }

  private startStatusMonitoring(): void {
    if (this.statusCheckInterval) {
      clearInterval(this.statusCheckInterval);
    }

    this.statusCheckInterval = setInterval(() => {
      const isConnected = this.pool.listConnectionStatus().get(this.url);
      if (!isConnected && this.phase === 'connected') {
        log('warn', `Relay ${this.url}: connection dropped`);
        this.updatePhase('disconnected');
      }
      if (this.phase !== 'connected' && this.statusCheckInterval) {
        clearInterval(this.statusCheckInterval);
        this.statusCheckInterval = null;
      }
    }, this.statusCheckIntervalMs);
  }
}
