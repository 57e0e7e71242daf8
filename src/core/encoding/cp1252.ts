/**
 * Windows-1252 single-byte decoding
 *
 * 0xA0-0xFF match Latin-1 (ISO-8859-1) and decode to the same codepoint.
 * 0x80-0x9F hold the CP1252 extensions; five of them are undefined.
 */

export const REPLACEMENT_CHARACTER = '\uFFFD';

/** Codepoints for bytes 0x80-0x9F, null where CP1252 assigns nothing */
const CP1252_HIGH_CONTROLS: ReadonlyArray<number | null> = [
  0x20ac, null, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021,
  0x02c6, 0x2030, 0x0160, 0x2039, 0x0152, null, 0x017d, null,
  null, 0x2018, 0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014,
  0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, null, 0x017e, 0x0178,
];

/** Bytes CP1252 leaves undefined */
export const CP1252_UNDEFINED_BYTES: ReadonlySet<number> = new Set([0x81, 0x8d, 0x8f, 0x90, 0x9d]);

/**
 * Decode one byte as CP1252.
 */
export function decodeCp1252Byte(byte: number): string {
  if (byte < 0x80 || byte >= 0xa0) {
    return String.fromCodePoint(byte);
  }
  const code = CP1252_HIGH_CONTROLS[byte - 0x80];
  return code === null || code === undefined ? REPLACEMENT_CHARACTER : String.fromCodePoint(code);
}
