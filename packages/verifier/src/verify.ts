/**
 * Ed25519 JWT verification against a JWKS URI
 */

import { isCryptoError, isFormatError, verifySignature } from '@didtoken/crypto';
import { JwksError, type KeyResolver } from '@didtoken/jwks-cache';
import type { VerifiedClaims } from './claims.js';
import { decodeToken } from './decode.js';
import { isVerificationError, VerificationError, type VerificationErrorCode } from './errors.js';
import { assertSupportedAlgorithm, resolveLeeway, validateClaims, type VerifyOptions } from './validate.js';

/**
 * Successful verification
 */
export interface VerifySuccess {
  ok: true;
  /** Claims after every check passed */
  claims: VerifiedClaims;
  /** Key ID from the token header (for logging/indexing) */
  kid: string | undefined;
  /** True when the key came from a JWKS document served past its TTL */
  stale: boolean;
}

/**
 * Failed verification. Only the first failing check is reported.
 */
export interface VerifyFailure {
  ok: false;
  code: VerificationErrorCode;
  message: string;
  error: VerificationError;
}

export type VerifyResult = VerifySuccess | VerifyFailure;

/**
 * Verify an EdDSA-signed JWT whose key is published at `jwksUri`.
 *
 * Order: decode, algorithm pin (before any key fetch), key resolution,
 * signature, then exp/nbf/iat/issuer/audience/subject. No claim is
 * evaluated before the signature has verified.
 *
 * Expected failures are returned, not thrown. Errors that are not part of
 * the verification taxonomy (a bug in a custom resolver, an invalid
 * leeway) are rethrown unchanged.
 *
 * @example
 * ```typescript
 * const resolver = new JwksResolver();
 * const result = await verifyEd25519Jwt(token, 'https://id.example/.well-known/jwks.json', resolver, {
 *   issuer: 'https://id.example',
 *   audience: 'https://api.example',
 * });
 * if (result.ok) {
 *   console.log('Subject:', result.claims.sub);
 * } else {
 *   console.error('Rejected:', result.code, result.message);
 * }
 * ```
 */
export async function verifyEd25519Jwt(
  token: string,
  jwksUri: string,
  resolver: KeyResolver,
  options: VerifyOptions = {}
): Promise<VerifyResult> {
  resolveLeeway(options.leeway);

  try {
    const { header, claims, signingInput, signature } = decodeToken(token);
    assertSupportedAlgorithm(header);

    const key = await resolver.resolve(jwksUri, header.kid);
    await verifySignature(signingInput, signature, key.publicKey);

    return {
      ok: true,
      claims: validateClaims(header, claims, options),
      kid: header.kid,
      stale: key.stale,
    };
  } catch (err) {
    const error = toVerificationError(err);
    if (!error) {
      throw err;
    }
    return { ok: false, code: error.code, message: error.message, error };
  }
}

/**
 * Map typed lower-layer errors onto the verification taxonomy.
 * Returns undefined for anything else.
 */
export function toVerificationError(err: unknown): VerificationError | undefined {
  if (isVerificationError(err)) {
    return err;
  }

  if (err instanceof JwksError) {
    return new VerificationError(jwksErrorCode(err), err.message, { cause: err });
  }

  if (isCryptoError(err)) {
    if (err.code === 'CRYPTO_INVALID_SIGNATURE') {
      return new VerificationError('E_INVALID_SIGNATURE', err.message, { cause: err });
    }
    if (err.code === 'CRYPTO_INVALID_KEY_LENGTH' || err.code === 'CRYPTO_INVALID_JWK') {
      return new VerificationError('E_JWKS_PARSE_FAILED', err.message, { cause: err });
    }
    if (isFormatError(err.code)) {
      return new VerificationError('E_MALFORMED_TOKEN', err.message, { cause: err });
    }
  }

  return undefined;
}

function jwksErrorCode(err: JwksError): VerificationErrorCode {
  if (err.stage === 'lookup') {
    return 'E_UNKNOWN_KEY_ID';
  }
  return err.stage === 'fetch' ? 'E_JWKS_FETCH_FAILED' : 'E_JWKS_PARSE_FAILED';
}
