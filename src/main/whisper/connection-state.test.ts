import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { ExitCode } from '../../shared/types';
import { ConnectionStateTracker, isAbortError } from './connection-state';
import { WhisperError } from './errors';

describe('ConnectionStateTracker', () => {
  let tracker: ConnectionStateTracker;

  beforeEach(() => {
    jest.useFakeTimers();
    tracker = new ConnectionStateTracker();
  });

  afterEach(() => {
    jest.clearAllTimers();
    jest.useRealTimers();
  });

  describe('phase', () => {
    it('starts disconnected and not terminated', () => {
      expect(tracker.phase).toBe('disconnected');
      expect(tracker.isConnected).toBe(false);
      expect(tracker.isTerminated).toBe(false);
    });

    it('notifies listeners only on change', () => {
      const listener = jest.fn();
      tracker.onPhaseChange(listener);

      tracker.setPhase('connecting');
      tracker.setPhase('connecting');
      tracker.setPhase('connected');

      expect(listener.mock.calls).toEqual([['connecting'], ['connected']]);
    });

    it('treats a disconnect after connecting as terminal', () => {
      tracker.setPhase('connecting');
      tracker.setPhase('connected');
      tracker.setPhase('disconnected');

      expect(tracker.isTerminated).toBe(true);
    });

    it('does not treat a failed first attempt as terminal', () => {
      tracker.setPhase('connecting');
      tracker.setPhase('error');

      expect(tracker.isTerminated).toBe(false);
    });
  });

  describe('waitForConnected', () => {
    it('resolves once the phase becomes connected', async () => {
      tracker.setPhase('connecting');
      const wait = tracker.waitForConnected(5000);

      await jest.advanceTimersByTimeAsync(300);
      tracker.setPhase('connected');
      await jest.advanceTimersByTimeAsync(100);

      await expect(wait).resolves.toBeUndefined();
    });

    it('rejects with a relay error when the phase becomes error', async () => {
      tracker.setPhase('connecting');
      const wait = tracker.waitForConnected(5000);
      const settled = wait.catch((error: unknown) => error);

      tracker.setPhase('error');
      await jest.advanceTimersByTimeAsync(100);

      const error = await settled;
      expect(error).toBeInstanceOf(WhisperError);
      expect(error).toMatchObject({ message: 'Relay connection failed', exitCode: ExitCode.RelayError });
    });

    it('rejects with a timeout error after timeoutMs', async () => {
      tracker.setPhase('connecting');
      const settled = tracker.waitForConnected(1000).catch((error: unknown) => error);

      await jest.advanceTimersByTimeAsync(1000);

      expect(await settled).toMatchObject({
        message: 'Relay connection timeout (try increasing --timeout)',
        exitCode: ExitCode.Timeout,
      });
    });

    it('rejects with an abort error when the signal fires', async () => {
      const controller = new AbortController();
      tracker.setPhase('connecting');
      const settled = tracker.waitForConnected(5000, controller.signal).catch((error: unknown) => error);

      controller.abort();
      await jest.advanceTimersByTimeAsync(100);

      expect(isAbortError(await settled)).toBe(true);
    });
  });
});
