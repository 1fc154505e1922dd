/**
 * JWS compact serialization with Ed25519 (RFC 7515, RFC 8037)
 *
 * Splitting and signature checking only. Producing signed tokens is a
 * test-fixture concern and lives in ./testkit.
 */

import { base64urlDecode, base64urlDecodeString } from './base64url.js';
import { PUBLIC_KEY_LENGTH, SIGNATURE_LENGTH, verify } from './ed25519.js';
import { CryptoError } from './errors.js';

/**
 * A compact JWS split into its three segments.
 */
export interface CompactJws {
  /** Header segment exactly as it appeared on the wire */
  headerB64: string;
  /** Payload segment exactly as it appeared on the wire */
  payloadB64: string;
  /** Signature segment exactly as it appeared on the wire */
  signatureB64: string;
  /** ASCII bytes of `headerB64 + "." + payloadB64` */
  signingInput: Uint8Array;
}

/**
 * Split a compact JWS into header, payload and signature segments.
 *
 * The signing input is rebuilt from the raw segments, never from a
 * re-serialized header or payload.
 *
 * @throws CryptoError CRYPTO_INVALID_JWS_FORMAT if there are not exactly three segments
 */
export function splitCompact(jws: string): CompactJws {
  const parts = jws.split('.');
  if (parts.length !== 3) {
    throw new CryptoError(
      'CRYPTO_INVALID_JWS_FORMAT',
      'Invalid JWS: must have three dot-separated parts'
    );
  }

  const [headerB64, payloadB64, signatureB64] = parts;

  return {
    headerB64,
    payloadB64,
    signatureB64,
    signingInput: new TextEncoder().encode(`${headerB64}.${payloadB64}`),
  };
}

/**
 * Decode a base64url segment holding a JSON object.
 *
 * @throws CryptoError if the segment is not base64url, not UTF-8, not JSON,
 *   or not a JSON object
 */
export function decodeJsonSegment(segment: string): Record<string, unknown> {
  const json = base64urlDecodeString(segment);

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new CryptoError('CRYPTO_INVALID_JSON', 'Segment is not valid JSON', { cause: err });
  }

  if (!isJsonObject(value)) {
    throw new CryptoError('CRYPTO_INVALID_JSON', 'Segment must be a JSON object');
  }

  return value;
}

/**
 * Decode the signature segment.
 *
 * Returns null for a segment that is not canonical base64url; the caller
 * treats that as a signature that cannot verify.
 */
export function decodeSignatureSegment(segment: string): Uint8Array | null {
  try {
    return base64urlDecode(segment);
  } catch (err) {
    if (err instanceof CryptoError) {
      return null;
    }
    throw err;
  }
}

/**
 * Verify an Ed25519 signature over a JWS signing input.
 *
 * @throws CryptoError CRYPTO_INVALID_SIGNATURE when the signature is absent,
 *   not 64 bytes, or does not verify under the key
 * @throws CryptoError CRYPTO_INVALID_KEY_LENGTH when the key is not 32 bytes
 */
export async function verifySignature(
  signingInput: Uint8Array,
  signature: Uint8Array | null,
  publicKey: Uint8Array
): Promise<void> {
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'Ed25519 public key must be 32 bytes');
  }
  if (signature === null || signature.length !== SIGNATURE_LENGTH) {
    throw new CryptoError('CRYPTO_INVALID_SIGNATURE', 'Ed25519 signature must be 64 bytes');
  }

  let valid: boolean;
  try {
    valid = await verify(signature, signingInput, publicKey);
  } catch (err) {
    // Malformed curve points surface as exceptions from the primitive
    throw new CryptoError('CRYPTO_INVALID_SIGNATURE', 'Signature verification failed', {
      cause: err,
    });
  }

  if (!valid) {
    throw new CryptoError('CRYPTO_INVALID_SIGNATURE', 'Signature verification failed');
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
