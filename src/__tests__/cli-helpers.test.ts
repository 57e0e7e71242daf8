/**
 * Tests for CLI option merging
 */

import { afterEach, describe, expect, it } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  applyCliOverrides,
  parseMaxBytes,
  toCliSettings,
  unknownLocaleWarning,
} from '../app/cli/helpers.js';
import { addApproximations, resetApproximations } from '../core/characters/index.js';
import { ConfigError } from '../core/models/index.js';
import type { SlugwrightConfig } from '../core/models/index.js';

const base: SlugwrightConfig = {
  backend: 'standard',
  ascii: false,
  maxBytes: 255,
  locale: 'german',
  logLevel: 'info',
  approximations: {},
};

describe('applyCliOverrides', () => {
  it('should keep the config when no flags are given', () => {
    expect(applyCliOverrides(base, {})).toEqual(base);
  });

  it('should let flags win over the config', () => {
    const result = applyCliOverrides(base, {
      ascii: true,
      maxBytes: 32,
      locale: 'spanish',
      backend: 'locale',
      caseLocale: 'tr',
    });

    expect(result).toMatchObject({
      ascii: true,
      maxBytes: 32,
      locale: 'spanish',
      backend: 'locale',
      caseLocale: 'tr',
    });
  });

  it('should reject an unknown backend', () => {
    expect(() => applyCliOverrides(base, { backend: 'iconv' })).toThrow(ConfigError);
    expect(() => applyCliOverrides(base, { backend: 'iconv' })).toThrow(
      '--backend must be one of: standard, locale, whatwg',
    );
  });

  it('should reject a malformed --case-locale', () => {
    expect(() => applyCliOverrides(base, { caseLocale: 'not a tag!!' })).toThrow(
      '--case-locale must be a valid BCP 47 language tag, got "not a tag!!"',
    );
  });

  it('should turn on debug logging for --verbose', () => {
    const result = applyCliOverrides(base, { verbose: true });

    expect(result.logLevel).toBe('debug');
    expect(result.debug).toEqual({ enabled: true, logFile: undefined });
  });

  it('should keep a configured log file for --verbose', () => {
    const result = applyCliOverrides(
      { ...base, debug: { enabled: false, logFile: 'slug.log' } },
      { verbose: true },
    );

    expect(result.debug).toEqual({ enabled: true, logFile: 'slug.log' });
  });

  it('should leave an enabled debug section alone', () => {
    const debug = { enabled: true, logFile: 'slug.log' };
    expect(applyCliOverrides({ ...base, debug }, { verbose: true }).debug).toBe(debug);
  });
});

describe('toCliSettings', () => {
  it('should pick the normalize settings', () => {
    expect(toCliSettings({ ...base, ascii: true, maxBytes: 40 })).toEqual({
      ascii: true,
      maxBytes: 40,
      locale: 'german',
    });
  });
});

describe('parseMaxBytes', () => {
  it('should parse non-negative integers', () => {
    expect(parseMaxBytes('80')).toBe(80);
    expect(parseMaxBytes('0')).toBe(0);
  });

  it('should reject anything else at the option boundary', () => {
    for (const value of ['abc', '', ' ', '-1', '1.5', 'Infinity']) {
      expect(() => parseMaxBytes(value), JSON.stringify(value)).toThrow(InvalidArgumentError);
    }
    expect(() => parseMaxBytes('abc')).toThrow('Expected a non-negative integer.');
  });
});

describe('unknownLocaleWarning', () => {
  afterEach(() => {
    resetApproximations();
  });

  it('should stay quiet for known or absent locales', () => {
    expect(unknownLocaleWarning(undefined)).toBeUndefined();
    expect(unknownLocaleWarning('german')).toBeUndefined();
  });

  it('should name the missing table', () => {
    expect(unknownLocaleWarning('martian')).toBe('No approximation table named "martian", using "latin" only');
  });

  it('should know tables registered from the config', () => {
    addApproximations('klingon', { 'ü': 'ue' });
    expect(unknownLocaleWarning('klingon')).toBeUndefined();
  });
});
