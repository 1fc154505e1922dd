/**
 * JWKS Cache error codes.
 */

export const ErrorCodes = {
  /** Network error fetching JWKS */
  JWKS_FETCH_FAILED: 'E_JWKS_FETCH_FAILED',
  /** Fetch timeout */
  JWKS_TIMEOUT: 'E_JWKS_TIMEOUT',
  /** Response > maxResponseBytes */
  JWKS_TOO_LARGE: 'E_JWKS_TOO_LARGE',
  /** Private IP, non-https or disallowed host */
  SSRF_BLOCKED: 'E_SSRF_BLOCKED',
  /** Invalid JSON or structure */
  JWKS_INVALID: 'E_JWKS_INVALID',
  /** keys.length > maxKeys */
  JWKS_TOO_MANY_KEYS: 'E_JWKS_TOO_MANY_KEYS',
  /** Selected key has malformed key material */
  KEY_INVALID: 'E_KEY_INVALID',
  /** Requested kid not in JWKS */
  KEY_NOT_FOUND: 'E_KEY_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Which stage of resolution an error belongs to.
 */
export type ErrorStage = 'fetch' | 'parse' | 'lookup';

export const ErrorStages: Record<ErrorCode, ErrorStage> = {
  [ErrorCodes.JWKS_FETCH_FAILED]: 'fetch',
  [ErrorCodes.JWKS_TIMEOUT]: 'fetch',
  [ErrorCodes.JWKS_TOO_LARGE]: 'fetch',
  [ErrorCodes.SSRF_BLOCKED]: 'fetch',
  [ErrorCodes.JWKS_INVALID]: 'parse',
  [ErrorCodes.JWKS_TOO_MANY_KEYS]: 'parse',
  [ErrorCodes.KEY_INVALID]: 'parse',
  [ErrorCodes.KEY_NOT_FOUND]: 'lookup',
};

/**
 * JWKS error with code and stage.
 */
export class JwksError extends Error {
  readonly code: ErrorCode;
  readonly stage: ErrorStage;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JwksError';
    this.code = code;
    this.stage = ErrorStages[code];
  }
}
