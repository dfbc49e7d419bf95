/**
 * Control Character Stripping
 *
 * Applied to every piece of remote text before it reaches the terminal, so a
 * peer cannot inject escape sequences or cursor movement.
 */

/**
 * stripControlChars(input: string | null | undefined): string | null
 *
 * CONTRACT:
 *   Inputs:
 *     - input: untrusted text, or null/undefined
 *
 *   Outputs:
 *     - null if input is null/undefined
 *     - otherwise a copy keeping, over the UTF-8 bytes of input:
 *       * horizontal tab (0x09) and newline (0x0A)
 *       * printable ASCII 0x20..0x7E
 *       * every byte >= 0x80, unchanged and unvalidated
 *
 *   Invariants:
 *     - All other C0 bytes (0x00..0x1F) and DEL (0x7F) are removed
 *     - Multi-byte sequences are never split or altered
 *
 *   Properties:
 *     - Idempotent: strip(strip(x)) equals strip(x)
 *     - Length: output byte length <= input byte length
 */
export function stripControlChars(input: string | null | undefined): string | null {
  if (input === null || input === undefined) {
    return null;
  }

  const bytes = Buffer.from(input, 'utf8');
  const output = Buffer.alloc(bytes.length);
  let length = 0;

  for (const byte of bytes) {
    if (byte === 0x09 || byte === 0x0a || byte >= 0x80 || (byte >= 0x20 && byte < 0x7f)) {
      output[length++] = byte;
    }
  }

  return output.subarray(0, length).toString('utf8');
}
