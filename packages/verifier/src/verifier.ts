/**
 * Verifier facade: one resolver, default options, outcome logging
 */

import { JwksResolver, type KeyResolver } from '@didtoken/jwks-cache';
import type { Logger } from 'pino';
import type { VerifiedClaims } from './claims.js';
import type { ErrorCategory } from './errors.js';
import { createLogger } from './logging.js';
import { resolveLeeway, type VerifyOptions } from './validate.js';
import { verifyEd25519Jwt, type VerifyResult } from './verify.js';

export interface TokenVerifierOptions extends VerifyOptions {
  /** Key resolver (defaults to a JwksResolver with default settings) */
  resolver?: KeyResolver;
  /** Logger (defaults to createLogger('didtoken')) */
  logger?: Logger;
}

const FAILURE_LEVELS: Record<ErrorCategory, 'debug' | 'warn'> = {
  security: 'warn',
  verification: 'warn',
  infrastructure: 'warn',
  validation: 'debug',
};

/**
 * Long-lived verifier holding one key resolver and its cache.
 *
 * Forged or algorithm-confused tokens are logged at warn, routine
 * rejections (expired, wrong audience) at debug. The token itself is never
 * logged.
 *
 * @example
 * ```typescript
 * const verifier = new TokenVerifier({ issuer: 'https://id.example' });
 * const claims = await verifier.verifyOrThrow(token, 'https://id.example/.well-known/jwks.json');
 * ```
 */
export class TokenVerifier {
  readonly resolver: KeyResolver;
  private readonly defaults: VerifyOptions;
  private readonly logger: Logger;

  constructor(options: TokenVerifierOptions = {}) {
    const { resolver, logger, ...defaults } = options;
    resolveLeeway(defaults.leeway);

    this.logger = logger ?? createLogger('didtoken');
    this.resolver = resolver ?? new JwksResolver({ logger: this.logger.child({ component: 'jwks' }) });
    this.defaults = defaults;
  }

  /**
   * Verify a token. Per-call options override the verifier defaults; an
   * option passed as undefined keeps the default.
   */
  async verify(token: string, jwksUri: string, options: VerifyOptions = {}): Promise<VerifyResult> {
    const result = await verifyEd25519Jwt(token, jwksUri, this.resolver, this.withDefaults(options));

    if (result.ok) {
      this.logger.info(
        { jwksUri, kid: result.kid, sub: result.claims.sub, stale: result.stale },
        'Token verified'
      );
    } else {
      this.logger[FAILURE_LEVELS[result.error.category]](
        { jwksUri, code: result.code, category: result.error.category, reason: result.message },
        'Token rejected'
      );
    }

    return result;
  }

  private withDefaults(options: VerifyOptions): VerifyOptions {
    return {
      issuer: options.issuer ?? this.defaults.issuer,
      audience: options.audience ?? this.defaults.audience,
      leeway: options.leeway ?? this.defaults.leeway,
      clock: options.clock ?? this.defaults.clock,
    };
  }

  /**
   * Verify a token and return its claims.
   *
   * @throws VerificationError on rejection
   */
  async verifyOrThrow(
    token: string,
    jwksUri: string,
    options: VerifyOptions = {}
  ): Promise<VerifiedClaims> {
    const result = await this.verify(token, jwksUri, options);
    if (!result.ok) {
      throw result.error;
    }
    return result.claims;
  }
}
