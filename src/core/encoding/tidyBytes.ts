/**
 * Encoding repair
 *
 * Keeps every well-formed UTF-8 sequence and decodes each remaining byte
 * as CP1252, so text mixing UTF-8 with Latin-1 or Windows-1252 bytes comes
 * out readable. Nothing here throws.
 */

import { REPLACEMENT_CHARACTER, decodeCp1252Byte } from './cp1252.js';
import { createLogger } from '../../shared/utils/debug.js';

const log = createLogger('encoding');

interface Utf8Sequence {
  code: number;
  length: number;
}

/**
 * Read the well-formed UTF-8 sequence starting at `start`, if any.
 * Rejects overlong forms, surrogates and codepoints past U+10FFFF.
 */
export function readUtf8Sequence(bytes: Uint8Array, start: number): Utf8Sequence | null {
  const lead = bytes[start];
  if (lead === undefined) return null;
  if (lead < 0x80) return { code: lead, length: 1 };

  let length: number;
  let code: number;
  // Allowed range of the first continuation byte
  let low = 0x80;
  let high = 0xbf;

  if (lead >= 0xc2 && lead <= 0xdf) {
    length = 2;
    code = lead & 0x1f;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    length = 3;
    code = lead & 0x0f;
    if (lead === 0xe0) low = 0xa0;
    if (lead === 0xed) high = 0x9f;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    length = 4;
    code = lead & 0x07;
    if (lead === 0xf0) low = 0x90;
    if (lead === 0xf4) high = 0x8f;
  } else {
    return null;
  }

  for (let offset = 1; offset < length; offset++) {
    const byte = bytes[start + offset];
    if (byte === undefined || byte < low || byte > high) {
      return null;
    }
    code = (code << 6) | (byte & 0x3f);
    low = 0x80;
    high = 0xbf;
  }

  return { code, length };
}

/**
 * Repair a byte sequence into well-formed text.
 */
export function tidyUtf8Bytes(bytes: Uint8Array): string {
  let result = '';
  let repaired = 0;
  let index = 0;

  while (index < bytes.length) {
    const sequence = readUtf8Sequence(bytes, index);
    if (sequence) {
      result += String.fromCodePoint(sequence.code);
      index += sequence.length;
    } else {
      result += decodeCp1252Byte(bytes[index] ?? 0);
      repaired++;
      index++;
    }
  }

  if (repaired > 0) {
    log.debug('Repaired bytes outside UTF-8', { repaired, total: bytes.length });
  }
  return result;
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Replace unpaired UTF-16 surrogates, the only way a JS string can fail
 * to encode as UTF-8.
 */
export function tidyString(value: string): string {
  return value.replace(LONE_SURROGATE, REPLACEMENT_CHARACTER);
}

/**
 * Repair strings or raw bytes into well-formed text.
 */
export function tidyBytes(input: string | Uint8Array): string {
  return typeof input === 'string' ? tidyString(input) : tidyUtf8Bytes(input);
}
