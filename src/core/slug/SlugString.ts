/**
 * SlugString - string wrapper with slug-specific transforms
 *
 * Every transform comes in two forms:
 *
 * - `cleanInPlace()` replaces the wrapped value and returns the new string
 * - `clean()` leaves the receiver alone and returns a new SlugString
 *
 *   const slug = new SlugString('hello world');
 *   slug.withDashes().toString(); // 'hello-world', slug still 'hello world'
 *   slug.withDashesInPlace();     // 'hello-world'
 *
 * Construction repairs the input encoding and composes it, so the wrapped
 * value is always well-formed.
 */

import type { ApproximationTable, NormalizeOptions, Utf8Backend } from '../models/index.js';
import { getUtf8Backend } from '../encoding/index.js';
import { codepointLength, utf8ByteLength } from '../../shared/utils/text.js';
import {
  approximateAscii,
  clean,
  toAscii,
  truncate,
  truncateBytes,
  wordChars,
  withDashes,
} from './transforms.js';
import { normalizeSlug } from './pipeline.js';

/** Anything a SlugString can be built from */
export type SlugInput = string | Uint8Array | SlugString | { toString(): string };

export interface SlugStringOptions {
  /** Backend for repair, composition and case mapping (default: process-wide backend) */
  backend?: Utf8Backend;
}

export class SlugString {
  private wrapped: string;
  private readonly backend: Utf8Backend;

  constructor(input: SlugInput, options: SlugStringOptions = {}) {
    if (input instanceof SlugString) {
      this.backend = options.backend ?? input.backend;
      this.wrapped = input.wrapped;
      return;
    }
    this.backend = options.backend ?? getUtf8Backend();
    const raw = typeof input === 'string' || input instanceof Uint8Array ? input : input.toString();
    this.wrapped = this.backend.compose(this.backend.tidyBytes(raw));
  }

  /** The wrapped string */
  get value(): string {
    return this.wrapped;
  }

  /** Length in codepoints */
  get length(): number {
    return codepointLength(this.wrapped);
  }

  /** Length of the UTF-8 encoding */
  get byteLength(): number {
    return utf8ByteLength(this.wrapped);
  }

  get backendName(): string {
    return this.backend.name;
  }

  toString(): string {
    return this.wrapped;
  }

  valueOf(): string {
    return this.wrapped;
  }

  toJSON(): string {
    return this.wrapped;
  }

  [Symbol.toPrimitive](): string {
    return this.wrapped;
  }

  equals(other: string | SlugString): boolean {
    return this.wrapped === other.toString();
  }

  /** Append text, returning a new SlugString */
  concat(...parts: Array<string | SlugString>): SlugString {
    return new SlugString(this.wrapped + parts.map((part) => part.toString()).join(''), {
      backend: this.backend,
    });
  }

  // ---- In-place transforms ----

  approximateAsciiInPlace(overrides?: string | ApproximationTable): string {
    return this.replace(approximateAscii(this.wrapped, overrides));
  }

  cleanInPlace(): string {
    return this.replace(clean(this.wrapped));
  }

  wordCharsInPlace(): string {
    return this.replace(wordChars(this.wrapped));
  }

  toAsciiInPlace(): string {
    return this.replace(toAscii(this.wrapped));
  }

  downcaseInPlace(): string {
    return this.replace(this.backend.downcase(this.wrapped));
  }

  upcaseInPlace(): string {
    return this.replace(this.backend.upcase(this.wrapped));
  }

  truncateInPlace(max: number): string {
    return this.replace(truncate(this.wrapped, max));
  }

  truncateBytesInPlace(max: number): string {
    return this.replace(truncateBytes(this.wrapped, max));
  }

  withDashesInPlace(): string {
    return this.replace(withDashes(this.wrapped));
  }

  normalizeInPlace(options: NormalizeOptions = {}): string {
    return this.replace(normalizeSlug(this.wrapped, options, this.backend));
  }

  composeInPlace(): string {
    return this.replace(this.backend.compose(this.wrapped));
  }

  tidyBytesInPlace(): string {
    return this.replace(this.backend.tidyBytes(this.wrapped));
  }

  // ---- Copying transforms ----

  approximateAscii(overrides?: string | ApproximationTable): SlugString {
    return this.derive((copy) => copy.approximateAsciiInPlace(overrides));
  }

  clean(): SlugString {
    return this.derive((copy) => copy.cleanInPlace());
  }

  wordChars(): SlugString {
    return this.derive((copy) => copy.wordCharsInPlace());
  }

  toAscii(): SlugString {
    return this.derive((copy) => copy.toAsciiInPlace());
  }

  downcase(): SlugString {
    return this.derive((copy) => copy.downcaseInPlace());
  }

  upcase(): SlugString {
    return this.derive((copy) => copy.upcaseInPlace());
  }

  truncate(max: number): SlugString {
    return this.derive((copy) => copy.truncateInPlace(max));
  }

  truncateBytes(max: number): SlugString {
    return this.derive((copy) => copy.truncateBytesInPlace(max));
  }

  withDashes(): SlugString {
    return this.derive((copy) => copy.withDashesInPlace());
  }

  normalize(options: NormalizeOptions = {}): SlugString {
    return this.derive((copy) => copy.normalizeInPlace(options));
  }

  compose(): SlugString {
    return this.derive((copy) => copy.composeInPlace());
  }

  tidyBytes(): SlugString {
    return this.derive((copy) => copy.tidyBytesInPlace());
  }

  toSlug(): SlugString {
    return this;
  }

  private replace(next: string): string {
    this.wrapped = next;
    return next;
  }

  /** Copy the receiver, apply an in-place transform to the copy, return the copy */
  private derive(mutate: (copy: SlugString) => string): SlugString {
    const copy = new SlugString(this);
    mutate(copy);
    return copy;
  }
}

/**
 * Wrap input in a SlugString. SlugString input is returned as is
 * unless a different backend is requested.
 */
export function toSlug(input: SlugInput, options: SlugStringOptions = {}): SlugString {
  if (input instanceof SlugString && options.backend === undefined) {
    return input;
  }
  return new SlugString(input, options);
}

/**
 * Normalize arbitrary input straight to a slug string.
 *
 * @example
 * slugify('Jürgen Müller, Esq.', { ascii: true, locale: 'german' }) // 'juergen-mueller-esq'
 */
export function slugify(input: SlugInput, options: NormalizeOptions & SlugStringOptions = {}): string {
  return new SlugString(input, { backend: options.backend }).normalizeInPlace(options);
}
