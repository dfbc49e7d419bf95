/**
 * Terminal access for the chat view
 *
 * Keypresses are decoded by Node's readline and queued; the render loop
 * pulls them one at a time with a bounded wait, so it never blocks longer
 * than its poll timeout.
 */

import readline from 'readline';

export interface KeyPress {
  name?: string;
  sequence: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

export interface Terminal {
  readonly rows: number;
  readonly columns: number;
  /** False when stdin or stdout is not an interactive terminal. */
  isAvailable(): boolean;
  /** Takes over the screen: raw mode, alternate buffer. */
  open(): void;
  /** Next queued key, or null once timeoutMs passes without one. */
  readKey(timeoutMs: number): Promise<KeyPress | null>;
  write(data: string): void;
  onResize(callback: () => void): void;
  /** Restores the terminal. Safe to call more than once. */
  close(): void;
}

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';
const CLEAR_SCREEN = '\x1b[2J';
const SHOW_CURSOR = '\x1b[?25h';

// Keys beyond this while the loop is busy are discarded
const MAX_QUEUED_KEYS = 1024;

export function toKeyPress(sequence: string | undefined, key: readline.Key | undefined): KeyPress {
  return {
    name: key?.name,
    sequence: key?.sequence ?? sequence ?? '',
    ctrl: key?.ctrl === true,
    meta: key?.meta === true,
    shift: key?.shift === true,
  };
}

export class NodeTerminal implements Terminal {
  private queue: KeyPress[] = [];
  private waiter: ((key: KeyPress) => void) | null = null;
  private resizeCallbacks: Array<() => void> = [];
  private opened = false;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout
  ) {}

  get rows(): number {
    return this.output.rows ?? 24;
  }

  get columns(): number {
    return this.output.columns ?? 80;
  }

  isAvailable(): boolean {
    return this.input.isTTY === true && this.output.isTTY === true;
  }

  open(): void {
    if (this.opened) {
      return;
    }
    if (!this.isAvailable()) {
      throw new Error('Interactive mode requires a terminal on stdin and stdout');
    }

    readline.emitKeypressEvents(this.input);
    this.input.setRawMode(true);
    this.input.on('keypress', this.handleKeypress);
    this.output.on('resize', this.handleResize);
    this.input.resume();
    this.output.write(ENTER_ALT_SCREEN + CLEAR_SCREEN);
    this.opened = true;
  }

  readKey(timeoutMs: number): Promise<KeyPress | null> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (key) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(key);
      };
    });
  }

  write(data: string): void {
    this.output.write(data);
  }

  onResize(callback: () => void): void {
    this.resizeCallbacks.push(callback);
  }

  close(): void {
    if (!this.opened) {
      return;
    }
    this.opened = false;
    this.input.off('keypress', this.handleKeypress);
    this.output.off('resize', this.handleResize);
    this.input.setRawMode(false);
    this.input.pause();
    this.output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
    this.queue = [];
  }

  private handleKeypress = (sequence: string | undefined, key: readline.Key | undefined): void => {
    const press = toKeyPress(sequence, key);
    if (this.waiter) {
      this.waiter(press);
    } else if (this.queue.length < MAX_QUEUED_KEYS) {
      this.queue.push(press);
    }
  };

  private handleResize = (): void => {
    for (const callback of this.resizeCallbacks) {
      callback();
    }
  };
}
