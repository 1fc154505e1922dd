/**
 * @didtoken/jwks-cache - JWKS types
 */

import type { Logger } from 'pino';

/**
 * JSON Web Key (JWK) as found in a fetched key set.
 *
 * Only OKP/Ed25519 keys with a string `x` are usable for verification; other
 * keys are kept in the document but skipped during resolution.
 */
export interface JWK {
  /** Key type - "OKP" for Ed25519 */
  kty: string;
  /** Curve - "Ed25519" for usable keys */
  crv?: string;
  /** Public key (base64url) */
  x?: string;
  /** Key ID (optional) */
  kid?: string;
  /** Key use (optional, e.g., "sig") */
  use?: string;
  /** Algorithm (optional, e.g., "EdDSA") */
  alg?: string;
}

/**
 * Parsed JSON Web Key Set. Frozen once constructed.
 */
export interface JwksDocument {
  readonly keys: readonly Readonly<JWK>[];
}

/**
 * Cache entry for one JWKS URI. Replaced wholesale on refresh.
 */
export interface CacheEntry {
  readonly document: JwksDocument;
  /** When the document was fetched (epoch milliseconds) */
  readonly fetchedAt: number;
  /** Freshness lifetime in seconds */
  readonly ttlSeconds: number;
}

/**
 * Time source returning epoch milliseconds.
 */
export type Clock = () => number;

/**
 * Transport used to fetch a JWKS document.
 *
 * Resolves with the raw response body or rejects with a transport error.
 * Implementations must stop when `signal` aborts.
 */
export type JwksFetcher = (uri: string, init: { signal: AbortSignal }) => Promise<Uint8Array>;

/**
 * JWKS resolver options.
 */
export interface ResolverOptions {
  /** Transport for JWKS documents (defaults to createHttpFetcher()) */
  fetcher?: JwksFetcher;
  /** Time source (defaults to Date.now) */
  clock?: Clock;
  /** Freshness lifetime of a fetched document in seconds (defaults to 300) */
  ttlSeconds?: number;
  /** Abort a fetch after this many milliseconds (defaults to 5000) */
  timeoutMs?: number;
  /** Max keys in JWKS (defaults to 100) */
  maxKeys?: number;
  /**
   * Serve the previous document when a refresh fails (default: true).
   */
  allowStale?: boolean;
  /**
   * Hard cap on how long past its TTL a document may still be served when
   * refresh fails. Unbounded when omitted.
   */
  maxStaleAgeSeconds?: number;
  /** Logger (defaults to the package logger) */
  logger?: Logger;
}

/**
 * Resolved verification key.
 */
export interface ResolvedKey {
  /** Raw Ed25519 public key (32 bytes) */
  publicKey: Uint8Array;
  /** The JWK the key came from */
  jwk: Readonly<JWK>;
  /** Whether the document came from cache without a fetch */
  cached: boolean;
  /** True when serving a past-TTL document because refresh failed */
  stale: boolean;
}

/**
 * Resolves the Ed25519 public key for a key id from a JWKS URI.
 */
export interface KeyResolver {
  resolve(jwksUri: string, kid: string | undefined): Promise<ResolvedKey>;
}
