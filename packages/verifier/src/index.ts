/**
 * @didtoken/verifier
 *
 * Verification of EdDSA/Ed25519 JWTs issued for DID subjects, with signing
 * keys resolved from a JWKS URI.
 *
 * @packageDocumentation
 */

// Errors
export {
  ERROR_CODES,
  ERRORS,
  VerificationError,
  isVerificationError,
} from './errors.js';
export type { VerificationErrorCode, ErrorCategory, ErrorDefinition } from './errors.js';

// Claims model
export { HeaderSchema, RegisteredClaimsSchema, MAX_CLAIM_DEPTH, audienceList } from './claims.js';
export type {
  Header,
  Claims,
  RegisteredClaims,
  VerifiedClaims,
  JsonValue,
  JsonPrimitive,
} from './claims.js';

// Decoding and policy
export { decodeToken } from './decode.js';
export type { DecodedToken } from './decode.js';
export {
  validateClaims,
  assertSupportedAlgorithm,
  resolveLeeway,
  SUPPORTED_ALGORITHM,
  DEFAULT_LEEWAY_SECONDS,
  DID_PREFIX,
} from './validate.js';
export type { VerifyOptions } from './validate.js';

// Verification
export { verifyEd25519Jwt, toVerificationError } from './verify.js';
export type { VerifyResult, VerifySuccess, VerifyFailure } from './verify.js';
export { TokenVerifier } from './verifier.js';
export type { TokenVerifierOptions } from './verifier.js';

// Ambient
export { createLogger } from './logging.js';
export type { LoggerOptions } from './logging.js';
export { loadConfig, createTokenVerifier } from './config.js';
export type { DidTokenConfig, VerifierOverrides } from './config.js';

// Key resolution
export { JwksResolver, createHttpFetcher } from '@didtoken/jwks-cache';
export type { KeyResolver, JwksFetcher, ResolverOptions } from '@didtoken/jwks-cache';
