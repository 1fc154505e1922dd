/**
 * Tests for Base64url encoding/decoding (RFC 4648 §5)
 */

import { describe, it, expect } from 'vitest';
import {
  base64urlEncode,
  base64urlDecode,
  base64urlEncodeString,
  base64urlDecodeString,
} from '../src/base64url.js';
import { CryptoError } from '../src/errors.js';

describe('Base64url encoding', () => {
  it('should encode bytes to base64url without padding', () => {
    const bytes = new Uint8Array([72, 101, 108, 108, 111]); // "Hello"
    expect(base64urlEncode(bytes)).toBe('SGVsbG8');
  });

  it('should use the URL-safe alphabet', () => {
    expect(base64urlEncode(new Uint8Array([0xfb, 0xff]))).toBe('-_8');
  });

  it('should decode base64url to bytes', () => {
    expect(Array.from(base64urlDecode('SGVsbG8'))).toEqual([72, 101, 108, 108, 111]);
  });

  it('should handle every unpadded length', () => {
    const tests = [
      { str: '', expected: [] },
      { str: 'YQ', expected: [97] },
      { str: 'YWI', expected: [97, 98] },
      { str: 'YWJj', expected: [97, 98, 99] },
    ];

    tests.forEach(({ str, expected }) => {
      expect(Array.from(base64urlDecode(str))).toEqual(expected);
    });
  });

  it('should roundtrip strings', () => {
    const original = 'did:key:z6Mk ünïcödé';
    expect(base64urlDecodeString(base64urlEncodeString(original))).toBe(original);
  });
});

describe('Base64url strict decoding', () => {
  it('rejects padding', () => {
    expect(() => base64urlDecode('YQ==')).toThrow(CryptoError);
  });

  it('rejects standard base64 characters', () => {
    expect(() => base64urlDecode('+/8')).toThrow(CryptoError);
  });

  it('rejects impossible lengths', () => {
    expect(() => base64urlDecode('YWJjZ')).toThrow(CryptoError);
  });

  it('rejects non-zero trailing bits', () => {
    // "YR" carries the same byte as "YQ" with a stray low bit set
    expect(() => base64urlDecode('YR')).toThrow(CryptoError);
  });

  it('reports CRYPTO_INVALID_BASE64URL', () => {
    try {
      base64urlDecode('a.b');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CryptoError);
      expect(err).toMatchObject({ code: 'CRYPTO_INVALID_BASE64URL' });
    }
  });

  it('rejects invalid UTF-8 when decoding strings', () => {
    const invalid = base64urlEncode(new Uint8Array([0xc3, 0x28]));
    try {
      base64urlDecodeString(invalid);
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({ code: 'CRYPTO_INVALID_UTF8' });
    }
  });
});
