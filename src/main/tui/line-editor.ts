import { KeyPress } from './terminal';

export const MAX_INPUT_LENGTH = 64 * 1024;

function isPrintable(text: string): boolean {
  if (text.length === 0) {
    return false;
  }
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      return false;
    }
  }
  return true;
}

/**
 * Single-line input buffer with a cursor.
 * The cursor is a UTF-16 index into the text, kept on code point boundaries.
 */
export class LineEditor {
  private buffer = '';
  private position = 0;

  get text(): string {
    return this.buffer;
  }

  get cursor(): number {
    return this.position;
  }

  /** Returns the current text and empties the buffer. */
  take(): string {
    const text = this.buffer;
    this.buffer = '';
    this.position = 0;
    return text;
  }

  insert(text: string): void {
    const room = MAX_INPUT_LENGTH - this.buffer.length;
    if (room <= 0) {
      return;
    }
    const chunk = Array.from(text).reduce((acc, char) => (acc.length + char.length <= room ? acc + char : acc), '');
    this.buffer = this.buffer.slice(0, this.position) + chunk + this.buffer.slice(this.position);
    this.position += chunk.length;
  }

  /**
   * Applies an editing key. Returns false for keys the editor does not handle.
   */
  handleKey(key: KeyPress): boolean {
    if (key.ctrl) {
      switch (key.name) {
        case 'a':
          this.position = 0;
          return true;
        case 'e':
          this.position = this.buffer.length;
          return true;
        case 'u':
          this.buffer = this.buffer.slice(this.position);
          this.position = 0;
          return true;
        case 'w':
          this.deleteWordBackward();
          return true;
        default:
          return false;
      }
    }

    switch (key.name) {
      case 'backspace':
        this.deleteBackward();
        return true;
      case 'delete':
        this.deleteForward();
        return true;
      case 'left':
        this.position = this.previousBoundary(this.position);
        return true;
      case 'right':
        this.position = this.nextBoundary(this.position);
        return true;
      case 'home':
        this.position = 0;
        return true;
      case 'end':
        this.position = this.buffer.length;
        return true;
      default:
        break;
    }

    if (!key.meta && isPrintable(key.sequence)) {
      this.insert(key.sequence);
      return true;
    }
    return false;
  }

  private deleteBackward(): void {
    if (this.position === 0) {
      return;
    }
    const start = this.previousBoundary(this.position);
    this.buffer = this.buffer.slice(0, start) + this.buffer.slice(this.position);
    this.position = start;
  }

  private deleteForward(): void {
    if (this.position >= this.buffer.length) {
      return;
    }
    const end = this.nextBoundary(this.position);
    this.buffer = this.buffer.slice(0, this.position) + this.buffer.slice(end);
  }

  private deleteWordBackward(): void {
    let start = this.position;
    while (start > 0 && this.buffer[start - 1] === ' ') {
      start--;
    }
    while (start > 0 && this.buffer[start - 1] !== ' ') {
      start--;
    }
    this.buffer = this.buffer.slice(0, start) + this.buffer.slice(this.position);
    this.position = start;
  }

  private previousBoundary(index: number): number {
    if (index <= 0) {
      return 0;
    }
    const code = this.buffer.charCodeAt(index - 1);
    const isLowSurrogate = code >= 0xdc00 && code <= 0xdfff;
    return isLowSurrogate && index >= 2 ? index - 2 : index - 1;
  }

  private nextBoundary(index: number): number {
    if (index >= this.buffer.length) {
      return this.buffer.length;
    }
    const code = this.buffer.charCodeAt(index);
    const isHighSurrogate = code >= 0xd800 && code <= 0xdbff;
    return isHighSurrogate && index + 2 <= this.buffer.length ? index + 2 : index + 1;
  }
}
