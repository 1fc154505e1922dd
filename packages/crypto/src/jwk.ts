/**
 * Ed25519 JWK helpers (RFC 8037 OKP keys)
 */

import { base64urlDecode, base64urlEncode } from './base64url.js';
import { PUBLIC_KEY_LENGTH } from './ed25519.js';
import { CryptoError } from './errors.js';

/**
 * Public Ed25519 JWK
 */
export interface Ed25519PublicJwk {
  kty: 'OKP';
  crv: 'Ed25519';
  /** Public key (base64url encoded, 32 bytes) */
  x: string;
  kid?: string;
}

/**
 * Minimal JWK shape accepted for key extraction
 */
export interface JwkLike {
  kty: string;
  crv?: string;
  x?: string;
}

/**
 * Whether a JWK describes an Ed25519 public key (kty OKP, crv Ed25519, string x)
 */
export function isEd25519Jwk(jwk: JwkLike): jwk is JwkLike & { crv: 'Ed25519'; x: string } {
  return jwk.kty === 'OKP' && jwk.crv === 'Ed25519' && typeof jwk.x === 'string';
}

/**
 * Convert JWK to Ed25519 public key bytes (32 bytes)
 *
 * @throws CryptoError CRYPTO_INVALID_JWK if the key is not OKP/Ed25519 or `x`
 *   is not base64url
 * @throws CryptoError CRYPTO_INVALID_KEY_LENGTH if `x` is not 32 bytes
 */
export function jwkToPublicKeyBytes(jwk: JwkLike): Uint8Array {
  if (!isEd25519Jwk(jwk)) {
    throw new CryptoError('CRYPTO_INVALID_JWK', 'Only Ed25519 keys (OKP/Ed25519) are supported');
  }

  let xBytes: Uint8Array;
  try {
    xBytes = base64urlDecode(jwk.x);
  } catch (err) {
    throw new CryptoError('CRYPTO_INVALID_JWK', 'JWK x is not valid base64url', { cause: err });
  }

  if (xBytes.length !== PUBLIC_KEY_LENGTH) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_LENGTH',
      `Ed25519 public key must be 32 bytes, got ${xBytes.length}`
    );
  }

  return xBytes;
}

/**
 * Build a public JWK from raw Ed25519 public key bytes
 */
export function publicKeyToJwk(publicKey: Uint8Array, kid?: string): Ed25519PublicJwk {
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'Ed25519 public key must be 32 bytes');
  }

  const jwk: Ed25519PublicJwk = { kty: 'OKP', crv: 'Ed25519', x: base64urlEncode(publicKey) };
  if (kid !== undefined) {
    jwk.kid = kid;
  }
  return jwk;
}
