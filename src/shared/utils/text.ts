/**
 * Text length utilities
 *
 * Pure functions measuring text by codepoint and by UTF-8 byte count.
 * Iteration is always by codepoint so surrogate pairs are never split.
 */

/**
 * Number of bytes the UTF-8 encoding of a codepoint occupies.
 */
export function utf8Length(code: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code < 0x10000) return 3;
  return 4;
}

/**
 * UTF-8 byte length of a well-formed string.
 */
export function utf8ByteLength(text: string): number {
  let bytes = 0;
  for (const char of text) {
    bytes += utf8Length(char.codePointAt(0) ?? 0);
  }
  return bytes;
}

/**
 * Number of codepoints in a string.
 */
export function codepointLength(text: string): number {
  return Array.from(text).length;
}
