import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import { stripControlChars } from './sanitize';

describe('stripControlChars', () => {
  it('returns null for null and undefined', () => {
    expect(stripControlChars(null)).toBeNull();
    expect(stripControlChars(undefined)).toBeNull();
  });

  it('removes escape sequences but keeps their printable remainder', () => {
    expect(stripControlChars('\x1b[31mred\x1b[0m')).toBe('[31mred[0m');
  });

  it('keeps tab and newline, drops carriage return, bell and DEL', () => {
    expect(stripControlChars('a\tb\r\nc\x07d\x7fe')).toBe('a\tb\ncde');
  });

  it('leaves multi-byte text untouched', () => {
    expect(stripControlChars('grüße 🙂 日本')).toBe('grüße 🙂 日本');
  });

  it('returns an empty string for input made only of control characters', () => {
    expect(stripControlChars('\x00\x01\x1b\x7f')).toBe('');
  });

  describe('properties', () => {
    it('is idempotent', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), (text) => {
          const once = stripControlChars(text);
          expect(stripControlChars(once)).toBe(once);
        })
      );
    });

    it('never leaves C0 controls other than tab and newline, nor DEL', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), (text) => {
          const stripped = stripControlChars(text) ?? '';
          for (const byte of Buffer.from(stripped, 'utf8')) {
            const allowed = byte === 0x09 || byte === 0x0a || byte >= 0x20;
            expect(allowed && byte !== 0x7f).toBe(true);
          }
        })
      );
    });

    it('preserves every non-ASCII character', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), (text) => {
          const nonAscii = Array.from(text).filter((char) => (char.codePointAt(0) ?? 0) >= 0x80);
          const kept = Array.from(stripControlChars(text) ?? '').filter((char) => (char.codePointAt(0) ?? 0) >= 0x80);
          expect(kept).toEqual(nonAscii);
        })
      );
    });

    it('never grows the input', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString(), (text) => {
          const stripped = stripControlChars(text) ?? '';
          expect(Buffer.byteLength(stripped, 'utf8')).toBeLessThanOrEqual(Buffer.byteLength(text, 'utf8'));
        })
      );
    });
  });
});
