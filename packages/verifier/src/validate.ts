/**
 * Claims policy: algorithm pinning, time window, issuer, audience, subject
 */

import { audienceList, type Claims, type Header, type VerifiedClaims } from './claims.js';
import { VerificationError } from './errors.js';

export const SUPPORTED_ALGORITHM = 'EdDSA';
export const DEFAULT_LEEWAY_SECONDS = 300;
export const DID_PREFIX = 'did:';

/**
 * Options for a single verification
 */
export interface VerifyOptions {
  /**
   * Expected issuer
   *
   * If provided, verification fails unless `iss` equals it exactly.
   */
  issuer?: string;

  /**
   * Expected audience
   *
   * If provided, verification fails unless it is one of the `aud` values.
   */
  audience?: string;

  /**
   * Clock skew tolerance (seconds), applied to exp, nbf and iat.
   * Defaults to 300.
   */
  leeway?: number;

  /**
   * Current time in epoch milliseconds. Defaults to Date.now.
   */
  clock?: () => number;
}

/**
 * Reject any algorithm other than EdDSA.
 *
 * @throws VerificationError E_UNSUPPORTED_ALGORITHM
 */
export function assertSupportedAlgorithm(header: Header): void {
  if (header.alg !== SUPPORTED_ALGORITHM) {
    throw new VerificationError(
      'E_UNSUPPORTED_ALGORITHM',
      `Unsupported algorithm "${header.alg}", expected "${SUPPORTED_ALGORITHM}"`
    );
  }
}

/**
 * Resolve and check the leeway option.
 *
 * @throws RangeError if leeway is negative or not finite
 */
export function resolveLeeway(leeway: number = DEFAULT_LEEWAY_SECONDS): number {
  if (!Number.isFinite(leeway) || leeway < 0) {
    throw new RangeError(`leeway must be a non-negative number of seconds, got ${leeway}`);
  }
  return leeway;
}

/**
 * Apply the claims policy to a token whose signature is already verified.
 *
 * Checks run in a fixed order and stop at the first failure:
 * algorithm, exp, nbf, iat, issuer, audience, subject. All time checks use
 * one `now` read from the clock.
 *
 * @throws VerificationError for the first failing check
 * @throws RangeError if the leeway option is invalid
 */
export function validateClaims(
  header: Header,
  claims: Claims,
  options: VerifyOptions = {}
): VerifiedClaims {
  const leeway = resolveLeeway(options.leeway);
  const clock = options.clock ?? Date.now;
  const now = Math.floor(clock() / 1000);

  assertSupportedAlgorithm(header);

  if (claims.exp !== undefined && now > claims.exp + leeway) {
    throw new VerificationError(
      'E_EXPIRED',
      `Token expired at ${claims.exp}, now is ${now} (leeway ${leeway}s)`
    );
  }

  if (claims.nbf !== undefined && now < claims.nbf - leeway) {
    throw new VerificationError(
      'E_NOT_YET_VALID',
      `Token not valid before ${claims.nbf}, now is ${now} (leeway ${leeway}s)`
    );
  }

  if (claims.iat !== undefined && claims.iat - leeway > now) {
    throw new VerificationError(
      'E_ISSUED_IN_FUTURE',
      `Token issued at ${claims.iat}, now is ${now} (leeway ${leeway}s)`
    );
  }

  if (options.issuer !== undefined && claims.iss !== options.issuer) {
    throw new VerificationError(
      'E_ISSUER_MISMATCH',
      `Issuer mismatch: expected "${options.issuer}", got "${claims.iss ?? 'undefined'}"`
    );
  }

  if (options.audience !== undefined && !audienceList(claims.aud).includes(options.audience)) {
    throw new VerificationError(
      'E_AUDIENCE_MISMATCH',
      `Audience mismatch: expected "${options.audience}" in aud`
    );
  }

  if (!claims.sub.startsWith(DID_PREFIX)) {
    throw new VerificationError('E_INVALID_SUBJECT', `Subject "${claims.sub}" is not a DID`);
  }

  return Object.freeze({ ...claims });
}
