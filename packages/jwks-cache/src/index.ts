/**
 * @didtoken/jwks-cache
 *
 * JWKS fetch, parse and TTL cache with single-flight refresh,
 * stale-while-revalidate fallback and SSRF protection.
 */

// Types
export type {
  JWK,
  JwksDocument,
  CacheEntry,
  Clock,
  JwksFetcher,
  ResolverOptions,
  ResolvedKey,
  KeyResolver,
} from './types.js';

// Cache
export { InMemoryCache, isFresh, staleAgeSeconds } from './cache.js';

// Parsing
export { parseJwks, validateJwks, selectKey, publicKeyOf, DEFAULT_MAX_KEYS } from './parse.js';

// Transport
export { createHttpFetcher, DEFAULT_MAX_RESPONSE_BYTES } from './fetcher.js';
export type { HttpFetcherOptions } from './fetcher.js';
export { validateUrl, isMetadataIp } from './security.js';
export type { UrlPolicy } from './security.js';

// Resolver
export { JwksResolver, DEFAULT_TTL_SECONDS, DEFAULT_TIMEOUT_MS } from './resolver.js';
export type { ResolvedDocument } from './resolver.js';

// Errors
export { ErrorCodes, ErrorStages, JwksError } from './errors.js';
export type { ErrorCode, ErrorStage } from './errors.js';
