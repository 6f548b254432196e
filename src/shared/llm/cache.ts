/**
 * Oracle Cache
 *
 * Response cache for oracle calls, keyed by a content hash of the prompt kind
 * and its normalized input. Owned by the caller and injected.
 */

import { createHash } from 'crypto';

/**
 * Cache entry with timestamp for TTL management
 */
interface CacheEntry {
  value: string;
  timestamp: number;
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
  maxEntries: number;
  /** Clock in milliseconds; injectable for tests */
  now?: () => number;
}

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttlSeconds: 3600, // 1 hour
  maxEntries: 1000
};

/**
 * Collapse whitespace runs so formatting differences share a key
 */
export function normalizeCacheInput(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

/**
 * SHA-256 of (kind, normalized input)
 */
export function cacheKey(kind: string, input: string): string {
  return createHash('sha256')
    .update(kind)
    .update('\u0000')
    .update(normalizeCacheInput(input))
    .digest('hex');
}

/**
 * Oracle response cache
 * Uses FIFO eviction when max entries is reached
 */
export class OracleCache {
  private cache: Map<string, CacheEntry> = new Map();
  private config: CacheConfig;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  private now(): number {
    return this.config.now ? this.config.now() : Date.now();
  }

  /**
   * Get cached response if available and not expired
   */
  get(kind: string, input: string): string | null {
    if (!this.config.enabled) {
      return null;
    }

    const key = cacheKey(kind, input);
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return null;
    }

    const age = (this.now() - entry.timestamp) / 1000;
    if (age > this.config.ttlSeconds) {
      this.cache.delete(key);
      this.misses++;
      return null;
    }

    this.hits++;
    return entry.value;
  }

  /**
   * Store response in cache
   */
  set(kind: string, input: string, value: string): void {
    if (!this.config.enabled) {
      return;
    }

    const key = cacheKey(kind, input);
    // Re-inserting moves the key to the back of the eviction queue
    this.cache.delete(key);

    if (this.cache.size >= this.config.maxEntries) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(key, {
      value,
      timestamp: this.now()
    });
  }

  /**
   * Clear all cached entries
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /**
   * Get cache statistics
   */
  getStats(): { size: number; maxEntries: number; enabled: boolean; hits: number; misses: number } {
    return {
      size: this.cache.size,
      maxEntries: this.config.maxEntries,
      enabled: this.config.enabled,
      hits: this.hits,
      misses: this.misses
    };
  }

  /**
   * Remove expired entries
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.cache.entries()) {
      const age = (now - entry.timestamp) / 1000;
      if (age > this.config.ttlSeconds) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }
}
