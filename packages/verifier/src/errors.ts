/**
 * Verification error codes
 *
 * Every rejection surfaces as exactly one of these codes. Lower layers
 * (CRYPTO_* from @didtoken/crypto, E_JWKS_* / E_KEY_* from
 * @didtoken/jwks-cache) are mapped onto this set by the orchestrator.
 */

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_MALFORMED_TOKEN: 'E_MALFORMED_TOKEN',
  E_UNSUPPORTED_ALGORITHM: 'E_UNSUPPORTED_ALGORITHM',
  E_UNKNOWN_KEY_ID: 'E_UNKNOWN_KEY_ID',
  E_INVALID_SIGNATURE: 'E_INVALID_SIGNATURE',
  E_EXPIRED: 'E_EXPIRED',
  E_NOT_YET_VALID: 'E_NOT_YET_VALID',
  E_ISSUED_IN_FUTURE: 'E_ISSUED_IN_FUTURE',
  E_ISSUER_MISMATCH: 'E_ISSUER_MISMATCH',
  E_AUDIENCE_MISMATCH: 'E_AUDIENCE_MISMATCH',
  E_INVALID_SUBJECT: 'E_INVALID_SUBJECT',
  E_JWKS_FETCH_FAILED: 'E_JWKS_FETCH_FAILED',
  E_JWKS_PARSE_FAILED: 'E_JWKS_PARSE_FAILED',
} as const;

export type VerificationErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * security: possible attack (forged or algorithm-confused token)
 * validation: authentic token that fails policy (routine)
 * verification: token cannot be matched to a key
 * infrastructure: key set unavailable or unusable
 */
export type ErrorCategory = 'security' | 'validation' | 'verification' | 'infrastructure';

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: VerificationErrorCode;
  http_status: number;
  title: string;
  description: string;
  retriable: boolean;
  category: ErrorCategory;
}

/**
 * Error definitions map
 */
export const ERRORS: Record<VerificationErrorCode, ErrorDefinition> = {
  E_MALFORMED_TOKEN: {
    code: 'E_MALFORMED_TOKEN',
    http_status: 400,
    title: 'Malformed Token',
    description: 'Token is not a compact JWS with JSON header and payload objects',
    retriable: false,
    category: 'validation',
  },
  E_UNSUPPORTED_ALGORITHM: {
    code: 'E_UNSUPPORTED_ALGORITHM',
    http_status: 401,
    title: 'Unsupported Algorithm',
    description: 'Token header alg is not EdDSA',
    retriable: false,
    category: 'security',
  },
  E_UNKNOWN_KEY_ID: {
    code: 'E_UNKNOWN_KEY_ID',
    http_status: 401,
    title: 'Unknown Key ID',
    description: 'No Ed25519 key in the JWKS matches the token kid',
    retriable: false,
    category: 'verification',
  },
  E_INVALID_SIGNATURE: {
    code: 'E_INVALID_SIGNATURE',
    http_status: 401,
    title: 'Invalid Signature',
    description: 'Ed25519 signature verification failed',
    retriable: false,
    category: 'security',
  },
  E_EXPIRED: {
    code: 'E_EXPIRED',
    http_status: 401,
    title: 'Token Expired',
    description: 'Token exp is in the past beyond the allowed leeway',
    retriable: false,
    category: 'validation',
  },
  E_NOT_YET_VALID: {
    code: 'E_NOT_YET_VALID',
    http_status: 401,
    title: 'Not Yet Valid',
    description: 'Token nbf is in the future beyond the allowed leeway',
    retriable: true,
    category: 'validation',
  },
  E_ISSUED_IN_FUTURE: {
    code: 'E_ISSUED_IN_FUTURE',
    http_status: 401,
    title: 'Issued In Future',
    description: 'Token iat is in the future beyond the allowed leeway',
    retriable: true,
    category: 'validation',
  },
  E_ISSUER_MISMATCH: {
    code: 'E_ISSUER_MISMATCH',
    http_status: 401,
    title: 'Issuer Mismatch',
    description: 'Token iss does not equal the expected issuer',
    retriable: false,
    category: 'validation',
  },
  E_AUDIENCE_MISMATCH: {
    code: 'E_AUDIENCE_MISMATCH',
    http_status: 401,
    title: 'Audience Mismatch',
    description: 'Expected audience is not among the token aud values',
    retriable: false,
    category: 'validation',
  },
  E_INVALID_SUBJECT: {
    code: 'E_INVALID_SUBJECT',
    http_status: 401,
    title: 'Invalid Subject',
    description: 'Token sub is not a DID',
    retriable: false,
    category: 'validation',
  },
  E_JWKS_FETCH_FAILED: {
    code: 'E_JWKS_FETCH_FAILED',
    http_status: 503,
    title: 'JWKS Fetch Failed',
    description: 'Failed to fetch public keys from JWKS endpoint',
    retriable: true,
    category: 'infrastructure',
  },
  E_JWKS_PARSE_FAILED: {
    code: 'E_JWKS_PARSE_FAILED',
    http_status: 502,
    title: 'JWKS Parse Failed',
    description: 'JWKS document or the selected key is malformed',
    retriable: true,
    category: 'infrastructure',
  },
};

/**
 * Typed verification failure.
 *
 * Use `err.code` to branch; `category` separates routine rejections from
 * ones worth alerting on.
 */
export class VerificationError extends Error {
  readonly code: VerificationErrorCode;
  readonly category: ErrorCategory;
  readonly retriable: boolean;
  readonly httpStatus: number;

  constructor(code: VerificationErrorCode, message?: string, options?: { cause?: unknown }) {
    const definition = ERRORS[code];
    super(message ?? definition.description, options);
    this.name = 'VerificationError';
    this.code = code;
    this.category = definition.category;
    this.retriable = definition.retriable;
    this.httpStatus = definition.http_status;
    Object.setPrototypeOf(this, VerificationError.prototype);
  }
}

/**
 * Structural check for VerificationError
 */
export function isVerificationError(err: unknown): err is VerificationError {
  return (
    err !== null &&
    typeof err === 'object' &&
    'name' in err &&
    err.name === 'VerificationError' &&
    'code' in err &&
    typeof err.code === 'string' &&
    Object.hasOwn(ERRORS, err.code)
  );
}
