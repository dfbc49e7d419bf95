/**
 * Render/input loop for the chat view
 *
 * One tick: wait up to 50ms for a key, apply it (or count an idle tick),
 * redraw if anything changed. Relay callbacks run between ticks and only
 * mark the view dirty.
 */

import chalk from 'chalk';
import { ConnectionStateTracker } from '../whisper/connection-state';
import { MessageStore } from '../whisper/message-store';
import { log } from '../logging';
import { LineEditor } from './line-editor';
import { computeLayout, renderFrame, statusGrey } from './screen';
import { KeyPress, Terminal } from './terminal';
import { ViewState } from './view-state';

export const KEY_POLL_TIMEOUT_MS = 50;
export const FADE_DELAY_TICKS = 100;
export const FADE_STEP_TICKS = 20;
export const FADE_STEP = 0.05;
export const FADE_FLOOR = 0.22;

export type LoopState = 'running' | 'terminating';

/**
 * Status bar emphasis after the given number of idle ticks.
 */
export function emphasisForIdleTicks(idleTicks: number): number {
  if (idleTicks <= FADE_DELAY_TICKS) {
    return 1;
  }
  const steps = Math.floor((idleTicks - FADE_DELAY_TICKS) / FADE_STEP_TICKS);
  return Math.max(FADE_FLOOR, 1 - steps * FADE_STEP);
}

export interface ChatLoopOptions {
  terminal: Terminal;
  store: MessageStore;
  connection: ConnectionStateTracker;
  view: ViewState;
  /** Receives each submitted input line. */
  submit: (line: string) => void;
  identityLabel: string;
  recipientLabel: () => string | undefined;
  signal?: AbortSignal;
  palette?: chalk.Chalk;
  pollTimeoutMs?: number;
}

/**
 * CONTRACT:
 *   State:
 *     - state: 'running' until a stop condition is seen, then 'terminating'
 *     - scrollOffset: records hidden below the viewport, in [0, max(0, size - viewportRows)]
 *     - idleTicks / emphasis: drive the status bar fade
 *
 *   Invariants:
 *     - No redraw happens unless the view is dirty
 *     - A stored record resets scrollOffset to 0
 *     - The loop stops on abort, a quit request, or a dropped connection,
 *       without needing another key
 */
export class ChatLoop {
  private loopState: LoopState = 'running';
  private scroll = 0;
  private idle = 0;
  private currentEmphasis = 1;
  private readonly editor = new LineEditor();
  private readonly palette: chalk.Chalk;
  private readonly pollTimeoutMs: number;
  private unsubscribeStore: (() => void) | null = null;

  constructor(private readonly options: ChatLoopOptions) {
    this.palette = options.palette ?? new chalk.Instance();
    this.pollTimeoutMs = options.pollTimeoutMs ?? KEY_POLL_TIMEOUT_MS;
  }

  get state(): LoopState {
    return this.loopState;
  }

  get scrollOffset(): number {
    return this.scroll;
  }

  get emphasis(): number {
    return this.currentEmphasis;
  }

  get inputText(): string {
    return this.editor.text;
  }

  async run(): Promise<void> {
    this.attach();
    try {
      this.redraw();
      while (this.checkRunning()) {
        await this.tick();
      }
    } finally {
      this.detach();
    }
  }

  /**
   * One poll-dispatch-redraw cycle.
   */
  async tick(): Promise<void> {
    const key = await this.options.terminal.readKey(this.pollTimeoutMs);

    if (key) {
      this.resetIdle();
      this.handleKey(key);
    } else {
      this.idle++;
      const previousGrey = statusGrey(this.currentEmphasis);
      this.currentEmphasis = emphasisForIdleTicks(this.idle);
      if (statusGrey(this.currentEmphasis) !== previousGrey) {
        this.options.view.markDirty();
      }
    }

    if (this.options.view.dirty && this.checkRunning()) {
      this.redraw();
    }
  }

  handleKey(key: KeyPress): void {
    const { view } = this.options;

    if (key.ctrl && (key.name === 'q' || key.name === 'c')) {
      view.requestQuit();
      return;
    }

    if (key.name === 'return') {
      const line = this.editor.take();
      view.markDirty();
      if (line.trim().length > 0) {
        this.options.submit(line);
      }
      return;
    }

    if (key.name === 'pageup' || key.name === 'up' || (key.ctrl && key.name === 'k')) {
      this.scrollBy(1);
      return;
    }

    // Ctrl+J arrives as a bare line feed, which readline names 'enter'
    if (key.name === 'pagedown' || key.name === 'down' || key.name === 'enter' || (key.ctrl && key.name === 'j')) {
      this.scrollBy(-1);
      return;
    }

    if (this.editor.handleKey(key)) {
      view.markDirty();
    }
  }

  redraw(): void {
    const { terminal, store, view } = this.options;
    const layout = computeLayout(terminal.rows);
    this.clampScroll();

    terminal.write(
      renderFrame(
        {
          rows: terminal.rows,
          columns: terminal.columns,
          identityLabel: this.options.identityLabel,
          recipientLabel: this.options.recipientLabel(),
          phase: this.options.connection.phase,
          statusText: view.status,
          emphasis: this.currentEmphasis,
          messages: store.snapshot(layout.viewportRows, this.scroll),
          inputText: this.editor.text,
          inputCursor: this.editor.cursor,
        },
        this.palette
      )
    );
    view.markDrawn();
  }

  private checkRunning(): boolean {
    if (this.loopState === 'terminating') {
      return false;
    }
    const { signal, view, connection } = this.options;
    if (signal?.aborted || view.quitRequested || connection.isTerminated) {
      this.loopState = 'terminating';
      log('info', `Chat loop terminating (${signal?.aborted ? 'signal' : view.quitRequested ? 'quit' : 'disconnected'})`);
      return false;
    }
    return true;
  }

  private maxScroll(): number {
    const { viewportRows } = computeLayout(this.options.terminal.rows);
    return Math.max(0, this.options.store.size - viewportRows);
  }

  private clampScroll(): void {
    this.scroll = Math.min(Math.max(0, this.scroll), this.maxScroll());
  }

  private scrollBy(delta: number): void {
    const before = this.scroll;
    this.scroll += delta;
    this.clampScroll();
    if (this.scroll !== before) {
      this.options.view.markDirty();
    }
  }

  private resetIdle(): void {
    this.idle = 0;
    if (this.currentEmphasis !== 1) {
      this.currentEmphasis = 1;
      this.options.view.markDirty();
    }
  }

  private attach(): void {
    const { store, view, terminal } = this.options;
    this.unsubscribeStore = store.onChange((change) => {
      if (change === 'insert') {
        this.scroll = 0;
        this.resetIdle();
      }
      view.markDirty();
    });
    terminal.onResize(() => view.markDirty());
  }

  private detach(): void {
    this.unsubscribeStore?.();
    this.unsubscribeStore = null;
  }
}
