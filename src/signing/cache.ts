/**
 * Signing Key Cache
 *
 * A SigV4 signing key depends only on the secret, the date, the region and
 * the service, so a signer derives it once per day instead of running four
 * HMAC rounds for every request. Entries are keyed by a credential identity
 * as well, so signers with different credentials can share one cache.
 */

import type { CacheEntry } from './types.js';

/**
 * Default TTL for cache entries (24 hours in milliseconds).
 */
const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Cache for derived signing keys, keyed by credential identity, date, region
 * and service.
 *
 * @example
 * ```typescript
 * const cache = new SigningKeyCache();
 * cache.set(identity, '20261019', 'us-east-1', 'email', signingKey);
 * const cached = cache.get(identity, '20261019', 'us-east-1', 'email');
 * ```
 */
export class SigningKeyCache {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;

  /**
   * @param ttlMs - Time-to-live for cache entries in milliseconds (default: 24 hours)
   */
  constructor(ttlMs: number = DEFAULT_TTL_MS) {
    this.ttlMs = ttlMs;
  }

  private getCacheKey(identity: string, date: string, region: string, service: string): string {
    return `${identity}:${date}:${region}:${service}`;
  }

  /**
   * Store a signing key in the cache.
   *
   * @param identity - Stands for the secret the key was derived from
   */
  set(identity: string, date: string, region: string, service: string, key: Buffer): void {
    this.cache.set(this.getCacheKey(identity, date, region, service), {
      key,
      expiresAt: Date.now() + this.ttlMs,
    });
  }

  /**
   * Retrieve a signing key, or `undefined` when absent or expired.
   * Expired entries are dropped on lookup.
   */
  get(identity: string, date: string, region: string, service: string): Buffer | undefined {
    const cacheKey = this.getCacheKey(identity, date, region, service);
    const entry = this.cache.get(cacheKey);

    if (!entry) {
      return undefined;
    }

    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(cacheKey);
      return undefined;
    }

    return entry.key;
  }

  /**
   * Remove all expired entries from the cache.
   *
   * @returns Number of entries removed
   */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }

  /**
   * Clear all entries from the cache.
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * Current number of entries, expired ones included until they are looked
   * up or cleaned.
   */
  get size(): number {
    return this.cache.size;
  }
}
