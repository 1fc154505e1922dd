/**
 * Typed errors for @didtoken/crypto
 *
 * These error codes are INTERNAL to @didtoken/crypto. Higher-level packages
 * (like @didtoken/verifier) map them to the canonical E_* verification codes.
 *
 * The CRYPTO_ prefix makes it clear these are package-internal codes.
 */

/**
 * Internal error codes for crypto operations
 */
export type CryptoErrorCode =
  | 'CRYPTO_INVALID_KEY_LENGTH'
  | 'CRYPTO_INVALID_SEED_LENGTH'
  | 'CRYPTO_INVALID_JWK'
  | 'CRYPTO_INVALID_JWS_FORMAT'
  | 'CRYPTO_INVALID_BASE64URL'
  | 'CRYPTO_INVALID_UTF8'
  | 'CRYPTO_INVALID_JSON'
  | 'CRYPTO_INVALID_SIGNATURE';

/**
 * Typed error for crypto operations
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CryptoError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}

/**
 * Check if a CryptoError code indicates a format/structure issue
 * (as opposed to a cryptographic verification failure)
 */
export function isFormatError(code: CryptoErrorCode): boolean {
  return (
    code === 'CRYPTO_INVALID_JWS_FORMAT' ||
    code === 'CRYPTO_INVALID_BASE64URL' ||
    code === 'CRYPTO_INVALID_UTF8' ||
    code === 'CRYPTO_INVALID_JSON'
  );
}

/**
 * Structural check for CryptoError
 * More robust than instanceof across module boundaries (ESM/CJS, duplicate packages)
 */
export function isCryptoError(err: unknown): err is CryptoError {
  return (
    err !== null &&
    typeof err === 'object' &&
    'name' in err &&
    err.name === 'CryptoError' &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('CRYPTO_')
  );
}
