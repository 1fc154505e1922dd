/**
 * JWKS resolver with TTL caching, single-flight refresh and
 * stale-while-revalidate fallback.
 */

import type { Logger } from 'pino';
import { InMemoryCache, isFresh, staleAgeSeconds } from './cache.js';
import { ErrorCodes, JwksError } from './errors.js';
import { createHttpFetcher } from './fetcher.js';
import { defaultLogger } from './logger.js';
import { DEFAULT_MAX_KEYS, parseJwks, publicKeyOf, selectKey, validateJwks } from './parse.js';
import type {
  CacheEntry,
  Clock,
  JWK,
  JwksDocument,
  JwksFetcher,
  KeyResolver,
  ResolvedKey,
  ResolverOptions,
} from './types.js';

export const DEFAULT_TTL_SECONDS = 300;
export const DEFAULT_TIMEOUT_MS = 5000;

export interface ResolvedDocument {
  document: JwksDocument;
  cached: boolean;
  stale: boolean;
}

/**
 * Resolves Ed25519 verification keys from JWKS URIs.
 *
 * One instance owns one cache. At most one fetch per URI is in flight;
 * concurrent callers that find the entry missing or past its TTL wait on
 * that fetch. When a refresh fails and an earlier document exists, the
 * earlier document is served (subject to `allowStale` and
 * `maxStaleAgeSeconds`). No retries are made.
 *
 * @example
 * ```typescript
 * const resolver = new JwksResolver({ ttlSeconds: 600 });
 * const { publicKey } = await resolver.resolve('https://id.example/.well-known/jwks.json', 'k1');
 * ```
 */
export class JwksResolver implements KeyResolver {
  private readonly cache = new InMemoryCache();
  private readonly inflight = new Map<string, Promise<ResolvedDocument>>();
  private readonly fetcher: JwksFetcher;
  private readonly clock: Clock;
  private readonly ttlSeconds: number;
  private readonly timeoutMs: number;
  private readonly maxKeys: number;
  private readonly allowStale: boolean;
  private readonly maxStaleAgeSeconds: number | undefined;
  private readonly logger: Logger;

  constructor(options: ResolverOptions = {}) {
    const {
      fetcher = createHttpFetcher(),
      clock = Date.now,
      ttlSeconds = DEFAULT_TTL_SECONDS,
      timeoutMs = DEFAULT_TIMEOUT_MS,
      maxKeys = DEFAULT_MAX_KEYS,
      allowStale = true,
      maxStaleAgeSeconds,
      logger = defaultLogger,
    } = options;

    if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
      throw new RangeError(`ttlSeconds must be a non-negative number, got ${ttlSeconds}`);
    }
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
    }
    if (maxStaleAgeSeconds !== undefined && !(maxStaleAgeSeconds >= 0)) {
      throw new RangeError(`maxStaleAgeSeconds must be non-negative, got ${maxStaleAgeSeconds}`);
    }

    this.fetcher = fetcher;
    this.clock = clock;
    this.ttlSeconds = ttlSeconds;
    this.timeoutMs = timeoutMs;
    this.maxKeys = maxKeys;
    this.allowStale = allowStale;
    this.maxStaleAgeSeconds = maxStaleAgeSeconds;
    this.logger = logger;
  }

  /**
   * Resolve the public key for `kid` from the JWKS at `jwksUri`.
   *
   * @throws JwksError fetch/parse failure with no usable cached document,
   *   E_KEY_NOT_FOUND when no Ed25519 key matches, E_KEY_INVALID when the
   *   matching key's `x` is not 32 bytes
   */
  async resolve(jwksUri: string, kid: string | undefined): Promise<ResolvedKey> {
    const { document, cached, stale } = await this.getDocument(jwksUri);
    const jwk = selectKey(document, kid);

    return {
      publicKey: publicKeyOf(jwk),
      jwk,
      cached,
      stale,
    };
  }

  /**
   * Get the JWKS document for a URI, fetching it when missing or past TTL.
   *
   * The cache check and the in-flight registration run in one synchronous
   * step, so every caller that misses joins the same fetch.
   */
  getDocument(jwksUri: string): Promise<ResolvedDocument> {
    const entry = this.cache.get(jwksUri);
    if (entry && isFresh(entry, this.clock())) {
      this.logger.debug({ jwksUri }, 'JWKS cache hit');
      return Promise.resolve({ document: entry.document, cached: true, stale: false });
    }

    const pending = this.inflight.get(jwksUri);
    if (pending) {
      this.logger.debug({ jwksUri }, 'Joining in-flight JWKS fetch');
      return pending;
    }

    const fetching: Promise<ResolvedDocument> = this.refresh(jwksUri, entry).finally(() => {
      if (this.inflight.get(jwksUri) === fetching) {
        this.inflight.delete(jwksUri);
      }
    });
    this.inflight.set(jwksUri, fetching);
    return fetching;
  }

  /**
   * Seed the cache with a known key set, as if it had just been fetched.
   */
  prime(jwksUri: string, jwks: { keys: readonly JWK[] }): JwksDocument {
    const document = validateJwks(jwks, this.maxKeys);
    this.cache.set(jwksUri, { document, fetchedAt: this.clock(), ttlSeconds: this.ttlSeconds });
    return document;
  }

  /**
   * Drop the cached document for a URI. The next resolve fetches again.
   */
  invalidate(jwksUri: string): boolean {
    const removed = this.cache.delete(jwksUri);
    if (removed) {
      this.logger.info({ jwksUri }, 'Invalidated JWKS cache');
    }
    return removed;
  }

  /**
   * Clear all cached documents.
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * Number of URIs with a cached document.
   */
  get size(): number {
    return this.cache.size;
  }

  private async refresh(jwksUri: string, previous: CacheEntry | undefined): Promise<ResolvedDocument> {
    this.logger.info({ jwksUri, reason: previous ? 'expired' : 'miss' }, 'Fetching JWKS');

    let document: JwksDocument;
    try {
      const body = await this.fetchWithTimeout(jwksUri);
      document = parseJwks(body, this.maxKeys);
    } catch (err) {
      if (!(err instanceof JwksError)) {
        throw err;
      }
      return this.fallback(jwksUri, previous, err);
    }

    this.cache.set(jwksUri, { document, fetchedAt: this.clock(), ttlSeconds: this.ttlSeconds });
    this.logger.info({ jwksUri, keyCount: document.keys.length }, 'JWKS refreshed');
    return { document, cached: false, stale: false };
  }

  private fallback(
    jwksUri: string,
    previous: CacheEntry | undefined,
    error: JwksError
  ): ResolvedDocument {
    if (previous && this.allowStale) {
      const ageSeconds = staleAgeSeconds(previous, this.clock());
      if (this.maxStaleAgeSeconds === undefined || ageSeconds <= this.maxStaleAgeSeconds) {
        this.logger.warn(
          { jwksUri, code: error.code, staleAgeSeconds: ageSeconds },
          'JWKS refresh failed, serving stale document'
        );
        return { document: previous.document, cached: true, stale: true };
      }
      this.logger.warn(
        { jwksUri, staleAgeSeconds: ageSeconds, maxStaleAgeSeconds: this.maxStaleAgeSeconds },
        'Stale JWKS document too old to serve'
      );
    }

    this.logger.error({ jwksUri, code: error.code, err: error }, 'JWKS refresh failed');
    throw error;
  }

  /**
   * Run the fetcher under a timeout. Any transport failure becomes a
   * JwksError so the fallback policy applies to it.
   */
  private async fetchWithTimeout(jwksUri: string): Promise<Uint8Array> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new JwksError(ErrorCodes.JWKS_TIMEOUT, `Fetch timeout after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.fetcher(jwksUri, { signal: controller.signal }), timeout]);
    } catch (error) {
      if (error instanceof JwksError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new JwksError(ErrorCodes.JWKS_FETCH_FAILED, `Fetch failed: ${message}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
