/**
 * Frame rendering for the chat view
 *
 * Pure functions from view state to an ANSI string. Layout, top to bottom:
 * status bar, message viewport (newest at the bottom), separator, input line,
 * key hints.
 */

import chalk from 'chalk';
import { ChatMessage, ConnectionPhase } from '../../shared/types';
import { stripControlChars } from '../whisper/sanitize';

export interface Layout {
  viewportRows: number;
  separatorRow: number;
  inputRow: number;
  hintRow: number;
}

export interface FrameState {
  rows: number;
  columns: number;
  identityLabel: string;
  recipientLabel?: string;
  phase: ConnectionPhase;
  statusText: string;
  emphasis: number;
  /** Oldest first; at most layout.viewportRows entries. */
  messages: ChatMessage[];
  inputText: string;
  inputCursor: number;
}

const PROMPT = '> ';
const SENDER_WIDTH = 15;
const KEY_HINTS = 'Enter send  PgUp/PgDn scroll  Ctrl+Q quit';

export function computeLayout(rows: number): Layout {
  const viewportRows = Math.max(1, rows - 4);
  return {
    viewportRows,
    separatorRow: viewportRows + 1,
    inputRow: viewportRows + 2,
    hintRow: viewportRows + 3,
  };
}

export function statusGrey(emphasis: number): number {
  return Math.max(40, Math.round(emphasis * 180));
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/** Local wall-clock time as HH:MM, or ??:?? outside the Date range. */
export function formatTime(timestamp: number): string {
  const date = new Date(timestamp * 1000);
  if (Number.isNaN(date.getTime())) {
    return '??:??';
  }
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/** Strips control characters and folds line breaks so text stays on one row. */
export function toSingleLine(text: string): string {
  return (stripControlChars(text) ?? '').replace(/[\t\r\n]/g, ' ');
}

/** Cuts text to at most width code points. */
export function fitWidth(text: string, width: number): string {
  if (width <= 0) {
    return '';
  }
  const chars = Array.from(text);
  return chars.length <= width ? text : chars.slice(0, width).join('');
}

function phaseLabel(phase: ConnectionPhase): string {
  switch (phase) {
    case 'connected':
      return 'connected';
    case 'connecting':
      return 'connecting...';
    case 'error':
      return 'connection error';
    case 'disconnected':
      return 'disconnected';
  }
}

/**
 * Builds the status bar text: identity and peer on the left, status text
 * right-aligned. The status text wins when the row is too narrow for both.
 */
export function formatStatusBar(state: FrameState): string {
  const recipient = state.recipientLabel ?? 'no recipient';
  let left = ` whisper  ${state.identityLabel}  to: ${recipient}  ${phaseLabel(state.phase)}`;
  const status = toSingleLine(state.statusText);

  if (status.length === 0) {
    return fitWidth(left, state.columns).padEnd(state.columns);
  }

  const statusStart = Math.max(0, state.columns - Array.from(status).length - 1);
  if (left.length > statusStart - 2) {
    left = fitWidth(left, Math.max(0, statusStart - 2));
  }
  const line = left.padEnd(statusStart) + status;
  return fitWidth(line, state.columns).padEnd(state.columns);
}

interface Segment {
  text: string;
  style: (text: string) => string;
}

function renderSegments(segments: Segment[], width: number): string {
  let remaining = width;
  let output = '';
  for (const segment of segments) {
    if (remaining <= 0) {
      break;
    }
    const text = fitWidth(segment.text, remaining);
    remaining -= Array.from(text).length;
    output += segment.style(text);
  }
  return output;
}

function messageSegments(message: ChatMessage, palette: chalk.Chalk): Segment[] {
  const sender = message.isOutgoing ? 'you' : message.senderLabel;
  return [
    { text: `${formatTime(message.timestamp)} `, style: palette.gray },
    {
      text: `${sender.padEnd(SENDER_WIDTH)} `,
      style: message.isOutgoing ? palette.cyan : palette.green,
    },
    { text: toSingleLine(message.content), style: palette.white },
  ];
}

/** One message row cut to the terminal width; plain text unless a palette is given. */
export function formatMessageLine(
  message: ChatMessage,
  columns: number,
  palette: chalk.Chalk = new chalk.Instance({ level: 0 })
): string {
  return renderSegments(messageSegments(message, palette), columns);
}

/** Visible slice of the input buffer and the cursor column within the row. */
export function inputWindow(text: string, cursor: number, columns: number): { visible: string; cursorColumn: number } {
  const available = Math.max(1, columns - PROMPT.length - 1);
  const start = Math.max(0, cursor - available);
  return {
    visible: text.slice(start, start + available),
    cursorColumn: PROMPT.length + (cursor - start),
  };
}

function moveTo(row: number, column: number): string {
  return `\x1b[${row + 1};${column + 1}H`;
}

const CLEAR_LINE = '\x1b[2K';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

/**
 * Renders a full frame. Every row is rewritten, so the result does not
 * depend on what the terminal showed before.
 */
export function renderFrame(state: FrameState, palette: chalk.Chalk): string {
  const layout = computeLayout(state.rows);
  const grey = statusGrey(state.emphasis);
  let frame = HIDE_CURSOR;

  frame += moveTo(0, 0) + palette.bgRgb(17, 17, 17).rgb(grey, grey, grey)(formatStatusBar(state));

  const messages = state.messages.slice(-layout.viewportRows);
  const firstRow = 1 + layout.viewportRows - messages.length;
  for (let row = 1; row <= layout.viewportRows; row++) {
    frame += moveTo(row, 0) + CLEAR_LINE;
    const message = messages[row - firstRow];
    if (row >= firstRow && message) {
      frame += formatMessageLine(message, state.columns, palette);
    }
  }

  frame += moveTo(layout.separatorRow, 0) + CLEAR_LINE + palette.gray('─'.repeat(Math.max(0, state.columns)));

  const input = inputWindow(state.inputText, state.inputCursor, state.columns);
  frame += moveTo(layout.inputRow, 0) + CLEAR_LINE + palette.bold(PROMPT) + input.visible;

  frame += moveTo(layout.hintRow, 0) + CLEAR_LINE + palette.dim(fitWidth(KEY_HINTS, state.columns));

  frame += moveTo(layout.inputRow, input.cursorColumn) + SHOW_CURSOR;
  return frame;
}
