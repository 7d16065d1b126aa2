/**
 * In-memory LRU cache for derived report values
 * @module status/cache/report-cache
 */

import { requireNonNegative } from '../../utils/errors.js'
import { createSilentLogger, type Logger } from '../../utils/logger.js'

export interface ReportCacheConfig {
  /** Maximum number of entries before the least recently used is evicted */
  maxSize: number
  /** Entry lifetime; 0 disables expiry */
  ttlSeconds: number
  /** Clock in milliseconds */
  now: () => number
  logger: Logger
}

export const DEFAULT_REPORT_CACHE_CONFIG: Omit<ReportCacheConfig, 'logger'> = {
  maxSize: 1000,
  ttlSeconds: 3600,
  now: () => Date.now(),
}

interface InternalEntry<V> {
  value: V
  expiresAt: number
  /** Invalidation tags, e.g. `memory:main|teacher:<id>` */
  tags: readonly string[]
}

export interface ReportCacheStats {
  hits: number
  misses: number
  hitRate: number
  size: number
  evictions: number
  expirations: number
  invalidations: number
}

/**
 * Bounded cache for derived values such as teacher progress.
 *
 * Entries are dropped on expiry, LRU eviction, or explicit invalidation by
 * tag. Import batches report the keys they touched, and every entry tagged
 * with one of them is removed.
 *
 * @example
 * ```typescript
 * const cache = new ReportCache<number>({ maxSize: 100 })
 * cache.set('count|teacher:t1', 3, ['teacher:t1'])
 * cache.invalidate(['teacher:t1']) // 1
 * ```
 */
export class ReportCache<V> {
  private readonly entries = new Map<string, InternalEntry<V>>()
  private readonly config: ReportCacheConfig
  private readonly stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
    expirations: 0,
    invalidations: 0,
  }

  constructor(config: Partial<ReportCacheConfig> = {}) {
    this.config = {
      ...DEFAULT_REPORT_CACHE_CONFIG,
      logger: createSilentLogger(),
      ...config,
    }
    requireNonNegative(this.config.maxSize, 'maxSize')
    requireNonNegative(this.config.ttlSeconds, 'ttlSeconds')
  }

  get size(): number {
    return this.entries.size
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this.stats.misses++
      return undefined
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key)
      this.stats.expirations++
      this.stats.misses++
      return undefined
    }

    // Reinsert to mark as most recently used
    this.entries.delete(key)
    this.entries.set(key, entry)
    this.stats.hits++
    return entry.value
  }

  set(key: string, value: V, tags: readonly string[] = []): void {
    if (this.config.maxSize === 0) return

    if (!this.entries.has(key) && this.entries.size >= this.config.maxSize) {
      this.evictLRU()
    }
    const ttl = this.config.ttlSeconds
    this.entries.delete(key)
    this.entries.set(key, {
      value,
      expiresAt: ttl > 0 ? this.config.now() + ttl * 1000 : Number.POSITIVE_INFINITY,
      tags: [...tags],
    })
  }

  /**
   * Cached value for `key`, computing and storing it on a miss
   */
  async getOrCompute(
    key: string,
    tags: readonly string[],
    compute: () => Promise<V>
  ): Promise<V> {
    const cached = this.get(key)
    if (cached !== undefined) return cached
    const value = await compute()
    this.set(key, value, tags)
    return value
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  /**
   * Removes every entry carrying any of the tags
   *
   * @returns number of entries removed
   */
  invalidate(tags: readonly string[]): number {
    if (tags.length === 0) return 0
    const wanted = new Set(tags)
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (entry.tags.some((tag) => wanted.has(tag))) {
        this.entries.delete(key)
        removed++
      }
    }
    this.stats.invalidations += removed
    if (removed > 0) {
      this.config.logger.debug('Report cache invalidated', { tags: tags.length, removed })
    }
    return removed
  }

  clear(): void {
    this.entries.clear()
  }

  getStats(): ReportCacheStats {
    const total = this.stats.hits + this.stats.misses
    return {
      ...this.stats,
      hitRate: total > 0 ? this.stats.hits / total : 0,
      size: this.entries.size,
    }
  }

  private isExpired(entry: InternalEntry<V>): boolean {
    return this.config.now() >= entry.expiresAt
  }

  private evictLRU(): void {
    const oldest = this.entries.keys().next()
    if (!oldest.done) {
      this.entries.delete(oldest.value)
      this.stats.evictions++
    }
  }
}
