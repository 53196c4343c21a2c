/**
 * Intelligent Response Cache
 *
 * In-memory cache for generated answers:
 * - Keys derived from the normalized query + relevant context
 * - Similarity lookup across phrasings (synonyms, word order, ids, dates)
 * - Per-entry TTL sized by answer confidence and data volume
 * - LRU eviction at capacity, lazy expiry on read, periodic sweep
 *
 * Every mutating method is synchronous, so writes, invalidations and the
 * sweep never interleave on the event loop.
 *
 * @version 1.0.0
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { logger } from '../logger';
import {
  calculateCacheTtl,
  DEFAULT_BASE_TTL_SECONDS,
  getEntryStatus,
  getExpiresAt,
  isEntryExpired,
} from './cache-ttl';
import { normalizeQuery } from './query-normalizer';
import {
  buildCacheHealth,
  buildCacheMetrics,
  createInitialStatsState,
  type ResponseCacheStatsState,
} from './response-cache.stats';
import {
  cleanupExpiredEntries,
  InvalidPatternError,
  evictLeastRecentlyUsed,
  invalidateCacheEntries,
  touchCacheEntry,
} from './response-cache.store';
import type {
  CacheContext,
  CacheEntryInfo,
  CacheHealth,
  CacheHit,
  CacheLookupOptions,
  CacheMetrics,
  CacheSetOptions,
  InvalidationCriteria,
  ResponseCacheConfig,
  ResponseCacheEntry,
} from './response-cache.types';
import { compareNormalizedQueries } from './similarity';

export { InvalidPatternError };

const cacheLogger = logger.child({ component: 'response-cache' });

// ============================================================================
// 1. Default Configuration
// ============================================================================

export const DEFAULT_RESPONSE_CACHE_CONFIG: ResponseCacheConfig = {
  maxSize: 1000,
  baseTtlSeconds: DEFAULT_BASE_TTL_SECONDS,
  similarityThreshold: 0.8,
  cleanupIntervalMs: 300_000,
  namespace: 'default',
  contextKeys: ['queryType', 'userType', 'filters'],
};

const DEFAULT_CONFIDENCE = 0.5;

export type CacheConfigUpdate = Partial<
  Pick<ResponseCacheConfig, 'maxSize' | 'baseTtlSeconds' | 'similarityThreshold'>
>;

const cacheConfigSchema = z.object({
  maxSize: z.number().int().positive(),
  baseTtlSeconds: z.number().positive(),
  similarityThreshold: z.number().min(0).max(1),
  cleanupIntervalMs: z.number().int().nonnegative(),
});

/** Invalid capacity, TTL, threshold or sweep interval */
export class CacheConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CacheConfigError';
  }
}

function assertValidConfig(config: ResponseCacheConfig): void {
  const parsed = cacheConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new CacheConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }
}

// ============================================================================
// 2. Helpers
// ============================================================================

function stableSerialize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableSerialize).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableSerialize(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function hash(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

function readPayloadConfidence(response: object): number | undefined {
  if ('confidenceScore' in response && typeof response.confidenceScore === 'number') {
    return response.confidenceScore;
  }
  return undefined;
}

function sameQueryText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

// ============================================================================
// 3. Response Cache
// ============================================================================

export class ResponseCache<T extends object> {
  private readonly cache = new Map<string, ResponseCacheEntry<T>>();
  private config: ResponseCacheConfig;
  private stats: ResponseCacheStatsState = createInitialStatsState();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(config: Partial<ResponseCacheConfig> = {}) {
    const defaults = DEFAULT_RESPONSE_CACHE_CONFIG;
    this.config = {
      maxSize: config.maxSize ?? defaults.maxSize,
      baseTtlSeconds: config.baseTtlSeconds ?? defaults.baseTtlSeconds,
      similarityThreshold: config.similarityThreshold ?? defaults.similarityThreshold,
      cleanupIntervalMs: config.cleanupIntervalMs ?? defaults.cleanupIntervalMs,
      namespace: config.namespace ?? defaults.namespace,
      contextKeys: config.contextKeys ?? defaults.contextKeys,
    };
    assertValidConfig(this.config);
    this.startCleanup();
  }

  get size(): number {
    return this.cache.size;
  }

  getConfig(): ResponseCacheConfig {
    return { ...this.config };
  }

  // --------------------------------------------------------------------------
  // 3.1 Keys
  // --------------------------------------------------------------------------

  private relevantContext(context?: CacheContext): Record<string, unknown> {
    const relevant: Record<string, unknown> = {};
    if (!context) return relevant;

    for (const key of this.config.contextKeys) {
      if (context[key] !== undefined) {
        relevant[key] = context[key];
      }
    }
    return relevant;
  }

  private contextKeyFor(context?: CacheContext): string {
    return hash(stableSerialize(this.relevantContext(context)));
  }

  keyFor(query: string, context?: CacheContext): string {
    return this.keyForNormalized(normalizeQuery(query), context);
  }

  private keyForNormalized(normalizedQuery: string, context?: CacheContext): string {
    return hash(
      stableSerialize({
        namespace: this.config.namespace,
        query: normalizedQuery,
        ...this.relevantContext(context),
      })
    );
  }

  // --------------------------------------------------------------------------
  // 3.2 Read
  // --------------------------------------------------------------------------

  /**
   * Exact key lookup, then (NORMALIZED_MATCH) the most similar live entry
   * in the same context at or above the similarity threshold.
   */
  get(query: string, options: CacheLookupOptions = {}): CacheHit<T> | null {
    const { context, strategy = 'NORMALIZED_MATCH' } = options;
    const now = Date.now();
    this.stats.totalRequests++;

    const normalizedQuery = normalizeQuery(query);
    const key = this.keyForNormalized(normalizedQuery, context);
    const exact = this.cache.get(key);

    if (exact) {
      if (!isEntryExpired(exact, now)) {
        return this.hit(exact, !sameQueryText(exact.originalQuery, query), now);
      }
      this.cache.delete(key);
      cacheLogger.debug({ cacheKey: key.slice(0, 8) }, 'Expired entry evicted on read');
    }

    if (strategy === 'NORMALIZED_MATCH') {
      const similar = this.findSimilarEntry(normalizedQuery, this.contextKeyFor(context), now);
      if (similar) {
        return this.hit(similar.entry, true, now);
      }
    }

    this.stats.misses++;
    cacheLogger.debug({ query: query.slice(0, 50), strategy }, 'Cache miss');
    return null;
  }

  private hit(entry: ResponseCacheEntry<T>, viaSimilarity: boolean, now: number): CacheHit<T> {
    touchCacheEntry(entry, now);
    this.stats.hits++;

    cacheLogger.debug(
      {
        cacheKey: entry.key.slice(0, 8),
        query: entry.originalQuery.slice(0, 50),
        similarity: viaSimilarity,
        accessCount: entry.accessCount,
      },
      'Cache hit'
    );

    return {
      ...entry.response,
      cacheUsed: true,
      cacheSimilarity: viaSimilarity,
      cacheStatus: getEntryStatus(entry, now),
      cacheAgeSeconds: Math.floor((now - entry.createdAt) / 1000),
      cacheKey: entry.key,
    };
  }

  private findSimilarEntry(
    normalizedQuery: string,
    contextKey: string,
    now: number
  ): { entry: ResponseCacheEntry<T>; similarity: number } | null {
    let best: { entry: ResponseCacheEntry<T>; similarity: number } | null = null;
    const expiredKeys: string[] = [];

    for (const entry of this.cache.values()) {
      if (entry.contextKey !== contextKey) continue;
      if (isEntryExpired(entry, now)) {
        expiredKeys.push(entry.key);
        continue;
      }

      const similarity = compareNormalizedQueries(normalizedQuery, entry.normalizedQuery);
      if (similarity < this.config.similarityThreshold) continue;

      if (
        !best ||
        similarity > best.similarity ||
        (similarity === best.similarity && entry.createdAt >= best.entry.createdAt)
      ) {
        best = { entry, similarity };
      }
    }

    for (const key of expiredKeys) {
      this.cache.delete(key);
    }

    return best;
  }

  // --------------------------------------------------------------------------
  // 3.3 Write
  // --------------------------------------------------------------------------

  set(query: string, response: T, options: CacheSetOptions = {}): string {
    const { context, tags, recordCount = 0 } = options;
    const now = Date.now();
    const normalizedQuery = normalizeQuery(query);
    const key = this.keyForNormalized(normalizedQuery, context);
    const confidence = options.confidence ?? readPayloadConfidence(response) ?? DEFAULT_CONFIDENCE;
    const ttlSeconds =
      options.ttlSeconds ?? calculateCacheTtl(confidence, recordCount, this.config.baseTtlSeconds);

    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.config.maxSize) {
      const evicted = evictLeastRecentlyUsed(this.cache, this.stats);
      cacheLogger.debug({ evicted: evicted?.slice(0, 8) }, 'Capacity eviction');
    }

    this.cache.set(key, {
      key,
      contextKey: this.contextKeyFor(context),
      originalQuery: query,
      normalizedQuery,
      response: { ...response },
      createdAt: now,
      lastAccessedAt: now,
      accessCount: 0,
      ttlSeconds,
      tags: new Set(tags ?? []),
      confidenceScore: confidence,
    });

    cacheLogger.debug(
      { cacheKey: key.slice(0, 8), query: query.slice(0, 50), ttlSeconds, size: this.cache.size },
      'Entry cached'
    );

    return key;
  }

  // --------------------------------------------------------------------------
  // 3.4 Invalidation & housekeeping
  // --------------------------------------------------------------------------

  /** @throws InvalidPatternError for a malformed `pattern`; nothing is removed */
  invalidate(criteria: InvalidationCriteria = {}): number {
    const removed = invalidateCacheEntries(this.cache, criteria);
    cacheLogger.info({ removed }, 'Cache invalidation');
    return removed;
  }

  clear(): void {
    const size = this.cache.size;
    this.cache.clear();
    cacheLogger.info({ removed: size }, 'Cache cleared');
  }

  resetMetrics(): void {
    this.stats = createInitialStatsState();
  }

  sweepExpired(now = Date.now()): number {
    const removed = cleanupExpiredEntries(this.cache, now);
    if (removed > 0) {
      cacheLogger.info({ removed }, 'Expired entries swept');
    }
    return removed;
  }

  startCleanup(): void {
    if (this.cleanupTimer || this.config.cleanupIntervalMs <= 0) return;

    this.cleanupTimer = setInterval(() => {
      this.sweepExpired();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref?.();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  /**
   * Shrinking `maxSize` evicts down to the new bound immediately.
   * @throws CacheConfigError, leaving the current configuration untouched
   */
  configure(update: CacheConfigUpdate): ResponseCacheConfig {
    const next: ResponseCacheConfig = {
      ...this.config,
      maxSize: update.maxSize ?? this.config.maxSize,
      baseTtlSeconds: update.baseTtlSeconds ?? this.config.baseTtlSeconds,
      similarityThreshold: update.similarityThreshold ?? this.config.similarityThreshold,
    };
    assertValidConfig(next);
    this.config = next;

    while (this.cache.size > this.config.maxSize) {
      evictLeastRecentlyUsed(this.cache, this.stats);
    }

    cacheLogger.info(
      {
        maxSize: this.config.maxSize,
        baseTtlSeconds: this.config.baseTtlSeconds,
        similarityThreshold: this.config.similarityThreshold,
      },
      'Cache reconfigured'
    );
    return this.getConfig();
  }

  destroy(): void {
    this.stopCleanup();
    this.clear();
  }

  // --------------------------------------------------------------------------
  // 3.5 Introspection
  // --------------------------------------------------------------------------

  has(key: string): boolean {
    return this.cache.has(key);
  }

  peek(key: string): Readonly<ResponseCacheEntry<T>> | undefined {
    return this.cache.get(key);
  }

  metrics(): CacheMetrics {
    return buildCacheMetrics(this.stats, this.cache, this.config.maxSize);
  }

  getHealth(): CacheHealth {
    return buildCacheHealth(this.metrics());
  }

  getInfo(query: string, context?: CacheContext): CacheEntryInfo {
    const now = Date.now();
    const normalizedQuery = normalizeQuery(query);
    const cacheKey = this.keyForNormalized(normalizedQuery, context);
    const entry = this.cache.get(cacheKey);

    const info: CacheEntryInfo = {
      cacheKey,
      normalizedQuery,
      existsInCache: entry !== undefined,
      similarEntries: [],
    };

    if (entry) {
      info.status = getEntryStatus(entry, now);
      info.createdAt = new Date(entry.createdAt).toISOString();
      info.expiresAt = new Date(getExpiresAt(entry)).toISOString();
      info.lastAccessedAt = new Date(entry.lastAccessedAt).toISOString();
      info.accessCount = entry.accessCount;
      info.ttlSeconds = entry.ttlSeconds;
      info.tags = [...entry.tags].sort();
    }

    const contextKey = this.contextKeyFor(context);
    for (const candidate of this.cache.values()) {
      if (candidate.key === cacheKey || candidate.contextKey !== contextKey) continue;
      const similarity = compareNormalizedQueries(normalizedQuery, candidate.normalizedQuery);
      if (similarity >= this.config.similarityThreshold) {
        info.similarEntries.push({
          query: candidate.originalQuery,
          similarity: Math.round(similarity * 1000) / 1000,
          status: getEntryStatus(candidate, now),
        });
      }
    }
    info.similarEntries.sort((a, b) => b.similarity - a.similarity);

    return info;
  }
}
