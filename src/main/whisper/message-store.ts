import { ChatMessage } from '../../shared/types';

export const DEFAULT_HISTORY_LIMIT = 1000;
export const MAX_CONTENT_BYTES = 64 * 1024;

export type MessageStoreChange = 'insert' | 'clear';

/**
 * Timestamp-ordered, capacity-bounded message history for the chat view.
 *
 * CONTRACT:
 *   State:
 *     - messages: array ordered by timestamp ascending, ties in insertion order
 *     - capacity: maximum number of retained messages
 *
 *   Invariants:
 *     - messages.length <= capacity at every observable point
 *     - A new message lands directly after the newest message whose timestamp
 *       is <= its own (scanning from the newest end), or at the front
 *     - Eviction always removes from the front (oldest first)
 *     - Every public method runs to completion synchronously. Relay callbacks
 *       and the render loop share one event loop, so no caller ever observes
 *       a half-applied insert or clear; listeners run after the mutation.
 *     - No I/O happens inside a mutation
 *
 *   Properties:
 *     - Snapshots are copies: later mutations never change a returned snapshot
 */
export class MessageStore {
  private messages: ChatMessage[] = [];
  private listeners: Array<(change: MessageStoreChange) => void> = [];

  constructor(private readonly capacity: number = DEFAULT_HISTORY_LIMIT) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('MessageStore capacity must be a positive integer');
    }
  }

  get size(): number {
    return this.messages.length;
  }

  get limit(): number {
    return this.capacity;
  }

  /**
   * Inserts in timestamp order and evicts the oldest entries past capacity.
   * Returns false, leaving the store untouched, when the message is dropped.
   */
  insert(message: ChatMessage): boolean {
    if (Buffer.byteLength(message.content, 'utf8') > MAX_CONTENT_BYTES) {
      return false;
    }

    const record: ChatMessage = { ...message };
    let index = this.messages.length;
    while (index > 0 && this.messages[index - 1].timestamp > record.timestamp) {
      index--;
    }
    this.messages.splice(index, 0, record);

    const overflow = this.messages.length - this.capacity;
    if (overflow > 0) {
      this.messages.splice(0, overflow);
    }

    this.notify('insert');
    return true;
  }

  /**
   * Copies up to maxRows messages ending scrollOffset messages back from the newest.
   */
  snapshot(maxRows: number, scrollOffset = 0): ChatMessage[] {
    const rows = Math.max(0, Math.floor(maxRows));
    const offset = Math.max(0, Math.floor(scrollOffset));
    const start = Math.max(0, this.messages.length - rows - offset);
    return this.messages.slice(start, start + rows).map((message) => ({ ...message }));
  }

  toArray(): ChatMessage[] {
    return this.messages.map((message) => ({ ...message }));
  }

  clear(): void {
    this.messages = [];
    this.notify('clear');
  }

  onChange(callback: (change: MessageStoreChange) => void): () => void {
    this.listeners.push(callback);
    return () => {
      this.listeners = this.listeners.filter((listener) => listener !== callback);
    };
  }

  private notify(change: MessageStoreChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
