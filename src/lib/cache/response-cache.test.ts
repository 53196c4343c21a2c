import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CacheConfigError, InvalidPatternError, ResponseCache } from './response-cache';

interface Payload {
  text: string;
  confidenceScore?: number;
}

const T0 = new Date('2026-03-01T08:00:00.000Z').getTime();

describe('ResponseCache', () => {
  let cache: ResponseCache<Payload>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    cache = new ResponseCache<Payload>({ cleanupIntervalMs: 0 });
  });

  afterEach(() => {
    cache.destroy();
    vi.useRealTimers();
  });

  // ============================================================================
  // 1. Read / write
  // ============================================================================
  describe('get / set', () => {
    it('returns the stored payload with cache markers', () => {
      const key = cache.set('Status of main transformers', { text: 'All transformers operational' });

      expect(cache.get('Status of main transformers')).toEqual({
        text: 'All transformers operational',
        cacheUsed: true,
        cacheSimilarity: false,
        cacheStatus: 'FRESH',
        cacheAgeSeconds: 0,
        cacheKey: key,
      });
    });

    it('returns null for unknown queries', () => {
      expect(cache.get('generator costs')).toBeNull();
    });

    it('flags a hit served for another phrasing of the same question', () => {
      cache.set('Status of main transformers', { text: 'All transformers operational' });

      const hit = cache.get('Situation of main transformers');
      expect(hit?.text).toBe('All transformers operational');
      expect(hit?.cacheSimilarity).toBe(true);
    });

    it('finds similar queries above the threshold', () => {
      cache.set('status of main transformers north substation', { text: 'north ok' });

      // 5 of 6 tokens shared
      const hit = cache.get('status of main transformers north substation yard');
      expect(hit?.text).toBe('north ok');
      expect(hit?.cacheSimilarity).toBe(true);
    });

    it('skips the similarity scan for EXACT_MATCH lookups', () => {
      cache.set('status of main transformers north substation', { text: 'north ok' });

      expect(
        cache.get('status of main transformers north substation yard', { strategy: 'EXACT_MATCH' })
      ).toBeNull();
    });

    it('does not match similar entries across contexts', () => {
      cache.set('status of main transformers north substation', { text: 'north ok' });

      expect(
        cache.get('status of main transformers north substation yard', {
          context: { queryType: 'costs' },
        })
      ).toBeNull();
    });

    it('keys on relevant context fields only', () => {
      const a = cache.keyFor('generator costs', { queryType: 'costs', requestId: 'r-1' });
      const b = cache.keyFor('generator costs', { queryType: 'costs', requestId: 'r-2' });
      const c = cache.keyFor('generator costs', { queryType: 'status' });

      expect(a).toBe(b);
      expect(a).not.toBe(c);
      expect(a).toMatch(/^[0-9a-f]{16}$/);
    });

    it('increments access count and last access time on hits', () => {
      const key = cache.set('generator costs', { text: 'R$ 10.000' });
      vi.advanceTimersByTime(5000);
      cache.get('generator costs');
      cache.get('generator costs');

      expect(cache.peek(key)?.accessCount).toBe(2);
      expect(cache.peek(key)?.lastAccessedAt).toBe(T0 + 5000);
    });

    it('overwrites an existing key without growing or evicting', () => {
      const small = new ResponseCache<Payload>({ maxSize: 1, cleanupIntervalMs: 0 });
      const first = small.set('generator costs', { text: 'v1' });
      const second = small.set('generator costs', { text: 'v2' });

      expect(second).toBe(first);
      expect(small.size).toBe(1);
      expect(small.metrics().evictionCount).toBe(0);
      expect(small.get('generator costs')?.text).toBe('v2');
      small.destroy();
    });

    it('stores a copy of the payload', () => {
      const payload = { text: 'original' };
      cache.set('generator costs', payload);
      payload.text = 'mutated';

      expect(cache.get('generator costs')?.text).toBe('original');
    });
  });

  // ============================================================================
  // 2. TTL
  // ============================================================================
  describe('ttl', () => {
    it('derives TTL from the payload confidence when none is given', () => {
      const confident = cache.set('generator costs', { text: 'x', confidenceScore: 1 });
      const neutral = cache.set('breaker inspection', { text: 'y' });

      expect(cache.peek(confident)?.ttlSeconds).toBe(7200);
      expect(cache.peek(neutral)?.ttlSeconds).toBe(4500);
    });

    it('uses confidence and record count from options', () => {
      const key = cache.set('generator costs', { text: 'x' }, { confidence: 0.8, recordCount: 4 });
      expect(cache.peek(key)?.ttlSeconds).toBe(7344);
    });

    it('does not clamp an explicit TTL', () => {
      const key = cache.set('generator costs', { text: 'x' }, { ttlSeconds: 60 });
      expect(cache.peek(key)?.ttlSeconds).toBe(60);
    });

    it('serves an entry until its TTL has fully elapsed', () => {
      cache.set('generator costs', { text: 'x' }, { ttlSeconds: 1 });

      vi.advanceTimersByTime(1000);
      expect(cache.get('generator costs')?.text).toBe('x');

      vi.advanceTimersByTime(1);
      expect(cache.get('generator costs')).toBeNull();
      expect(cache.size).toBe(0);
    });

    it('reports STALE entries after 75% of the TTL', () => {
      cache.set('generator costs', { text: 'x' }, { ttlSeconds: 100 });
      vi.advanceTimersByTime(75_000);

      const hit = cache.get('generator costs');
      expect(hit?.cacheStatus).toBe('STALE');
      expect(hit?.cacheAgeSeconds).toBe(75);
    });

    it('sweeps expired entries on the cleanup interval', () => {
      const swept = new ResponseCache<Payload>({ cleanupIntervalMs: 1000 });
      swept.set('generator costs', { text: 'x' }, { ttlSeconds: 1 });
      swept.set('breaker inspection', { text: 'y' }, { ttlSeconds: 60 });

      vi.advanceTimersByTime(2000);

      expect(swept.size).toBe(1);
      swept.destroy();
    });

    it('stops sweeping after stopCleanup', () => {
      const swept = new ResponseCache<Payload>({ cleanupIntervalMs: 1000 });
      swept.set('generator costs', { text: 'x' }, { ttlSeconds: 1 });
      swept.stopCleanup();

      vi.advanceTimersByTime(5000);

      expect(swept.size).toBe(1);
      swept.destroy();
    });
  });

  // ============================================================================
  // 3. Capacity
  // ============================================================================
  describe('capacity', () => {
    it('evicts the least recently accessed entry when full', () => {
      const small = new ResponseCache<Payload>({ maxSize: 2, cleanupIntervalMs: 0 });
      small.set('transformer failures', { text: 'a' });
      vi.advanceTimersByTime(10);
      small.set('generator costs', { text: 'b' });
      vi.advanceTimersByTime(10);
      small.get('transformer failures');
      vi.advanceTimersByTime(10);
      small.set('breaker inspection', { text: 'c' });

      expect(small.size).toBe(2);
      expect(small.get('generator costs')).toBeNull();
      expect(small.get('transformer failures')?.text).toBe('a');
      expect(small.metrics().evictionCount).toBe(1);
      small.destroy();
    });

    it('falls back to insertion order when access times tie', () => {
      const small = new ResponseCache<Payload>({ maxSize: 2, cleanupIntervalMs: 0 });
      small.set('transformer failures', { text: 'a' });
      small.set('generator costs', { text: 'b' });
      small.set('breaker inspection', { text: 'c' });

      expect(small.get('transformer failures')).toBeNull();
      expect(small.get('generator costs')?.text).toBe('b');
      small.destroy();
    });

    it('evicts down to a reduced maxSize immediately', () => {
      cache.set('transformer failures', { text: 'a' });
      cache.set('generator costs', { text: 'b' });
      cache.set('breaker inspection', { text: 'c' });

      const config = cache.configure({ maxSize: 1 });

      expect(config.maxSize).toBe(1);
      expect(cache.size).toBe(1);
      expect(cache.metrics().evictionCount).toBe(2);
    });

    it('rejects a non-positive maxSize and keeps the previous bound', () => {
      expect(() => cache.configure({ maxSize: 0 })).toThrow(CacheConfigError);
      expect(() => cache.configure({ maxSize: 2.5 })).toThrow(CacheConfigError);

      cache.set('generator costs', { text: 'b' });

      expect(cache.getConfig().maxSize).toBe(1000);
      expect(cache.size).toBe(1);
    });

    it('rejects a similarity threshold outside [0, 1]', () => {
      expect(() => cache.configure({ similarityThreshold: 1.5 })).toThrow(
        'similarityThreshold: Number must be less than or equal to 1'
      );
      expect(cache.getConfig().similarityThreshold).toBe(0.8);
    });

    it('rejects an invalid initial configuration', () => {
      expect(() => new ResponseCache<Payload>({ maxSize: 0, cleanupIntervalMs: 0 })).toThrow(
        'maxSize: Number must be greater than 0'
      );
    });
  });

  // ============================================================================
  // 4. Invalidation
  // ============================================================================
  describe('invalidate', () => {
    beforeEach(() => {
      cache.set('transformer failures', { text: 'a' }, { tags: ['transformer', 'failure'] });
      vi.advanceTimersByTime(1000);
      cache.set('transformer status', { text: 'b' }, { tags: ['transformer', 'status'] });
      vi.advanceTimersByTime(1000);
      cache.set('generator costs', { text: 'c' }, { tags: ['generator', 'cost'] });
    });

    it('removes entries sharing any tag', () => {
      expect(cache.invalidate({ tags: ['transformer'] })).toBe(2);
      expect(cache.size).toBe(1);
      expect(cache.get('generator costs')?.text).toBe('c');
    });

    it('matches the pattern case-insensitively against the original query', () => {
      expect(cache.invalidate({ pattern: 'GENERATOR' })).toBe(1);
      expect(cache.size).toBe(2);
    });

    it('removes entries created before a cutoff', () => {
      expect(cache.invalidate({ olderThan: T0 + 500 })).toBe(1);
      expect(cache.get('transformer failures', { strategy: 'EXACT_MATCH' })).toBeNull();
    });

    it('combines criteria with OR', () => {
      expect(cache.invalidate({ pattern: 'costs', tags: ['failure'] })).toBe(2);
    });

    it('rejects a malformed pattern without removing anything', () => {
      expect(() => cache.invalidate({ pattern: '(' })).toThrow(InvalidPatternError);
      expect(() => cache.invalidate({ pattern: '(', tags: ['cost'] })).toThrow(
        'Invalid invalidation pattern "("'
      );
      expect(cache.size).toBe(3);
    });

    it('removes nothing without criteria', () => {
      expect(cache.invalidate({})).toBe(0);
      expect(cache.size).toBe(3);
    });

    it('clear drops every entry', () => {
      cache.clear();
      expect(cache.size).toBe(0);
    });
  });

  // ============================================================================
  // 5. Metrics & introspection
  // ============================================================================
  describe('metrics', () => {
    it('tracks hits, misses and rates', () => {
      cache.set('generator costs', { text: 'x' });
      cache.get('generator costs');
      cache.get('breaker inspection');
      cache.get('transformer failures');

      const metrics = cache.metrics();
      expect(metrics).toMatchObject({
        totalRequests: 3,
        hits: 1,
        misses: 2,
        hitRate: 0.333,
        missRate: 0.667,
        size: 1,
        maxSize: 1000,
        expiredCount: 0,
        staleCount: 0,
        evictionCount: 0,
      });
      // {"text":"x"}
      expect(metrics.averageResponseSize).toBe(12);
    });

    it('reports critical health with no hits', () => {
      cache.get('generator costs');
      const health = cache.getHealth();

      expect(health.status).toBe('critical');
      expect(health.recommendations).toContain(
        'Low hit rate - consider lowering the similarity threshold'
      );
    });

    it('describes a cached query and its similar entries', () => {
      cache.set('status of main transformers north substation', { text: 'x' }, { ttlSeconds: 3600, tags: ['status', 'transformer'] });
      cache.set('status of main transformers north substation yard', { text: 'y' });

      const info = cache.getInfo('status of main transformers north substation');

      expect(info).toMatchObject({
        normalizedQuery: 'main north status substation transformer',
        existsInCache: true,
        status: 'FRESH',
        accessCount: 0,
        ttlSeconds: 3600,
        tags: ['status', 'transformer'],
        createdAt: '2026-03-01T08:00:00.000Z',
        expiresAt: '2026-03-01T09:00:00.000Z',
      });
      expect(info.similarEntries).toEqual([
        {
          query: 'status of main transformers north substation yard',
          similarity: 0.833,
          status: 'FRESH',
        },
      ]);
    });

    it('reports a missing query', () => {
      const info = cache.getInfo('breaker inspection');
      expect(info.existsInCache).toBe(false);
      expect(info.status).toBeUndefined();
    });
  });
});
