/**
 * Base64url encoding/decoding (RFC 4648 §5)
 * Used for JWS compact serialization
 */

import { CryptoError } from './errors.js';

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Encode bytes to base64url string (no padding)
 */
export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/**
 * Decode an unpadded base64url string to bytes.
 *
 * Rejects padding, characters outside the URL-safe alphabet, impossible
 * lengths and non-zero trailing bits, so every byte sequence has exactly
 * one accepted encoding.
 *
 * @throws CryptoError with code CRYPTO_INVALID_BASE64URL
 */
export function base64urlDecode(str: string): Uint8Array {
  if (!BASE64URL_ALPHABET.test(str) || str.length % 4 === 1) {
    throw new CryptoError('CRYPTO_INVALID_BASE64URL', 'Invalid base64url encoding');
  }

  const bytes = new Uint8Array(Buffer.from(str, 'base64url'));

  if (base64urlEncode(bytes) !== str) {
    throw new CryptoError('CRYPTO_INVALID_BASE64URL', 'Non-canonical base64url encoding');
  }

  return bytes;
}

/**
 * Encode UTF-8 string to base64url
 */
export function base64urlEncodeString(str: string): string {
  return base64urlEncode(new TextEncoder().encode(str));
}

/**
 * Decode base64url to UTF-8 string
 *
 * @throws CryptoError with code CRYPTO_INVALID_BASE64URL or CRYPTO_INVALID_UTF8
 */
export function base64urlDecodeString(str: string): string {
  const bytes = base64urlDecode(str);
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new CryptoError('CRYPTO_INVALID_UTF8', 'Decoded bytes are not valid UTF-8', {
      cause: err,
    });
  }
}
