/**
 * In-memory cache of JWKS documents keyed by URI.
 */

import type { CacheEntry } from './types.js';

/**
 * Map-backed cache. Entries are never expired here: the resolver decides
 * freshness, and keeps past-TTL entries around as stale fallbacks.
 */
export class InMemoryCache {
  private readonly cache = new Map<string, CacheEntry>();

  get(uri: string): CacheEntry | undefined {
    return this.cache.get(uri);
  }

  set(uri: string, entry: CacheEntry): void {
    this.cache.set(uri, entry);
  }

  delete(uri: string): boolean {
    return this.cache.delete(uri);
  }

  /**
   * Clear all entries.
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * Get current cache size.
   */
  get size(): number {
    return this.cache.size;
  }
}

/**
 * Age of an entry in whole milliseconds at `now`.
 */
export function entryAgeMs(entry: CacheEntry, now: number): number {
  return now - entry.fetchedAt;
}

/**
 * Whether an entry is still within its TTL at `now` (epoch ms).
 */
export function isFresh(entry: CacheEntry, now: number): boolean {
  return entryAgeMs(entry, now) < entry.ttlSeconds * 1000;
}

/**
 * Seconds an entry has been past its TTL at `now` (0 while fresh).
 */
export function staleAgeSeconds(entry: CacheEntry, now: number): number {
  return Math.max(0, Math.floor((entryAgeMs(entry, now) - entry.ttlSeconds * 1000) / 1000));
}
