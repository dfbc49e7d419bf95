import { ConnectionPhase, ExitCode } from '../../shared/types';
import { WhisperError } from './errors';

export const CONNECT_POLL_INTERVAL_MS = 100;

/**
 * Current relay phase, written from relay callbacks and read by every mode.
 *
 * CONTRACT:
 *   Invariants:
 *     - The phase is a single value; readers never see a partial update
 *     - setPhase only stores and notifies: it never blocks and never touches
 *       the message store
 *     - Once 'connected' has been seen, a later 'disconnected' is terminal
 *       (isTerminated stays true; there is no reconnect)
 */
export class ConnectionStateTracker {
  private current: ConnectionPhase = 'disconnected';
  private everConnected = false;
  private callbacks: Array<(phase: ConnectionPhase) => void> = [];

  get phase(): ConnectionPhase {
    return this.current;
  }

  get isConnected(): boolean {
    return this.current === 'connected';
  }

  get isTerminated(): boolean {
    return this.everConnected && this.current === 'disconnected';
  }

  setPhase(phase: ConnectionPhase): void {
    if (phase === this.current) {
      return;
    }
    this.current = phase;
    if (phase === 'connected') {
      this.everConnected = true;
    }
    for (const callback of this.callbacks) {
      callback(phase);
    }
  }

  onPhaseChange(callback: (phase: ConnectionPhase) => void): void {
    this.callbacks.push(callback);
  }

  /**
   * Polls the phase every 100ms until it reads 'connected'.
   *
   * Rejects with a RelayError WhisperError as soon as 'error' is observed,
   * with a Timeout WhisperError once timeoutMs has elapsed, and with an
   * AbortError when the signal fires.
   */
  async waitForConnected(
    timeoutMs: number,
    signal?: AbortSignal,
    pollIntervalMs: number = CONNECT_POLL_INTERVAL_MS
  ): Promise<void> {
    let elapsed = 0;

    for (;;) {
      if (signal?.aborted) {
        throw abortError();
      }
      if (this.current === 'connected') {
        return;
      }
      if (this.current === 'error') {
        throw new WhisperError('Relay connection failed', ExitCode.RelayError);
      }
      if (elapsed >= timeoutMs) {
        throw new WhisperError('Relay connection timeout (try increasing --timeout)', ExitCode.Timeout);
      }
      await sleep(pollIntervalMs);
      elapsed += pollIntervalMs;
    }
  }
}

export function abortError(): Error {
  const error = new Error('Operation aborted');
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
