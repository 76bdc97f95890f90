/**
 * Tests for identifier styles and style inference.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  allCaps,
  camelLower,
  camelUpper,
  firstUpper,
  identityStyle,
  infer,
  underscoreCap,
  withPrefix,
  STYLE_PROBES,
} from '../../../../src/core/ident/styles.js';

const canonicalToken = fc
  .array(fc.stringMatching(/^[a-z][a-z0-9]{0,6}$/), { minLength: 1, maxLength: 4 })
  .map((words) => words.join('_'));

describe('identifier styles', () => {
  it('should convert foo_bar in each built-in style', () => {
    expect(camelUpper('foo_bar')).toBe('FooBar');
    expect(camelLower('foo_bar')).toBe('fooBar');
    expect(identityStyle('foo_bar')).toBe('foo_bar');
    expect(underscoreCap('foo_bar')).toBe('Foo_Bar');
    expect(allCaps('foo_bar')).toBe('FOO_BAR');
  });

  it('should keep the leading case of the first word in camelLower', () => {
    expect(camelLower('URL_loader')).toBe('URLLoader');
    expect(camelLower('x')).toBe('x');
  });

  it('should leave empty tokens empty', () => {
    expect(firstUpper('')).toBe('');
    expect(camelUpper('')).toBe('');
    expect(camelLower('')).toBe('');
  });

  it('should prepend a literal with withPrefix', () => {
    expect(withPrefix('m', camelUpper)('foo_bar')).toBe('mFooBar');
    expect(withPrefix('k_', allCaps)('max_size')).toBe('k_MAX_SIZE');
  });

  it('should keep probes in inference order', () => {
    expect(STYLE_PROBES.map((p) => p.probe)).toEqual(['FooBar', 'fooBar', 'foo_bar', 'Foo_Bar', 'FOO_BAR']);
  });
});

describe('infer', () => {
  it.each([
    ['FooBar', 'user_id', 'UserId'],
    ['fooBar', 'user_id', 'userId'],
    ['foo_bar', 'user_id', 'user_id'],
    ['Foo_Bar', 'user_id', 'User_Id'],
    ['FOO_BAR', 'user_id', 'USER_ID'],
    ['mFooBar', 'user_id', 'mUserId'],
    ['k_FOO_BAR', 'user_id', 'k_USER_ID'],
    ['BGFooBar', 'user_id', 'BGUserId'],
    ['NativeFooBar', 'user_id', 'NativeUserId'],
    ['_fooBar', 'user_id', '_userId'],
  ])('should infer %s', (example, token, expected) => {
    const style = infer(example);
    expect(style).toBeDefined();
    expect(style?.(token)).toBe(expected);
  });

  it('should keep word boundaries in underscoreCap', () => {
    fc.assert(
      fc.property(canonicalToken, (token) => {
        const parts = underscoreCap(token).split('_');
        expect(parts.map((word) => word.toLowerCase())).toEqual(token.split('_'));
      })
    );
  });

  it('should start each word with a capital in camelUpper', () => {
    fc.assert(
      fc.property(canonicalToken, (token) => {
        const parts = camelUpper(token).split(/(?=[A-Z])/);
        expect(parts.map((word) => word.toLowerCase())).toEqual(token.split('_'));
      })
    );
  });

  it('should return undefined for examples matching no probe', () => {
    expect(infer('fooBarBaz')).toBeUndefined();
    expect(infer('FooBAR')).toBeUndefined();
    expect(infer('')).toBeUndefined();
  });

  it('should reproduce the example when applied to the probe token', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[A-Za-z_]{0,4}$/), fc.integer({ min: 0, max: 4 }), (prefix, index) => {
        const probe = STYLE_PROBES[index].probe;
        const style = infer(prefix + probe);
        expect(style?.('foo_bar')).toBe(prefix + probe);
      })
    );
  });

  it('should round-trip canonical tokens through camelUpper and identity', () => {
    fc.assert(
      fc.property(canonicalToken, (token) => {
        expect(infer('FooBar')?.(token)).toBe(camelUpper(token));
        expect(infer('foo_bar')?.(token)).toBe(token);
      })
    );
  });
});
