/**
 * Bearer token cache keyed by challenge.
 * @module auth/token-cache
 */

import type { SecretString } from './secret.js';

/**
 * A bearer token issued for one `(realm, service, scope)` key.
 */
export interface BearerToken {
  readonly token: SecretString;
  /** Absolute expiry, epoch milliseconds */
  readonly expiresAt: number;
  readonly issuedAt?: number;
  readonly scope?: string;
}

/**
 * Options for TokenCache.
 */
export interface TokenCacheOptions {
  /** Maximum cached tokens, oldest evicted first (default: 100) */
  maxSize?: number;
  /** Tokens count as expired this many milliseconds early (default: 30s) */
  expiryMargin?: number;
  /** Clock, epoch milliseconds */
  now?: () => number;
}

/**
 * Token cache with expiry and a size bound.
 *
 * Reads never block; the negotiator owns the only writer path.
 */
export class TokenCache {
  private readonly cache = new Map<string, BearerToken>();
  private readonly maxSize: number;
  private readonly expiryMargin: number;
  private readonly now: () => number;

  constructor(options: TokenCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 100;
    this.expiryMargin = options.expiryMargin ?? 30000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Gets a token that is still valid, dropping it if it has expired.
   */
  get(key: string): BearerToken | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt - this.expiryMargin <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, token: BearerToken): void {
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      this.cleanup();
    }
    // Still full: drop the oldest live entry
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }
    this.cache.delete(key);
    this.cache.set(key, token);
  }

  /**
   * Removes the entry for `key`. When `token` is given, only removes it if
   * it is still the cached one, so a token refreshed by another caller
   * survives a stale invalidation.
   */
  delete(key: string, token?: SecretString): boolean {
    const entry = this.cache.get(key);
    if (!entry) {
      return false;
    }
    if (token && !entry.token.equals(token)) {
      return false;
    }
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  /**
   * Drops every expired entry. `set` runs it before evicting a live token.
   */
  cleanup(): void {
    const now = this.now();
    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt - this.expiryMargin <= now) {
        this.cache.delete(key);
      }
    }
  }
}
