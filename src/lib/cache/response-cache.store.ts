import { isEntryExpired } from './cache-ttl';
import type {
  InvalidationCriteria,
  ResponseCacheEntry,
} from './response-cache.types';
import type { ResponseCacheStatsState } from './response-cache.stats';

type EntryMap<T extends object> = Map<string, ResponseCacheEntry<T>>;

export class InvalidPatternError extends Error {
  public readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    super(`Invalid invalidation pattern "${pattern}": ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
  }
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch (error) {
    throw new InvalidPatternError(pattern, error);
  }
}

export function touchCacheEntry(
  entry: ResponseCacheEntry<object>,
  now = Date.now()
): void {
  entry.accessCount++;
  entry.lastAccessedAt = now;
}

/**
 * Least recently accessed entry; ties go to the oldest `createdAt`,
 * then to insertion order.
 */
export function findEvictionCandidate<T extends object>(cache: EntryMap<T>): string | undefined {
  let candidate: ResponseCacheEntry<T> | undefined;

  for (const entry of cache.values()) {
    if (
      !candidate ||
      entry.lastAccessedAt < candidate.lastAccessedAt ||
      (entry.lastAccessedAt === candidate.lastAccessedAt &&
        entry.createdAt < candidate.createdAt)
    ) {
      candidate = entry;
    }
  }

  return candidate?.key;
}

export function evictLeastRecentlyUsed<T extends object>(
  cache: EntryMap<T>,
  stats: ResponseCacheStatsState
): string | undefined {
  const key = findEvictionCandidate(cache);
  if (key === undefined) return undefined;

  cache.delete(key);
  stats.evictions++;
  return key;
}

export function cleanupExpiredEntries<T extends object>(
  cache: EntryMap<T>,
  now = Date.now()
): number {
  const expiredKeys: string[] = [];

  for (const [key, entry] of cache.entries()) {
    if (isEntryExpired(entry, now)) {
      expiredKeys.push(key);
    }
  }

  for (const key of expiredKeys) {
    cache.delete(key);
  }

  return expiredKeys.length;
}

export function matchesInvalidation(
  entry: ResponseCacheEntry<object>,
  criteria: { regex: RegExp | null; tags: Set<string>; olderThan: number | null }
): boolean {
  if (criteria.regex && criteria.regex.test(entry.originalQuery)) {
    return true;
  }

  for (const tag of criteria.tags) {
    if (entry.tags.has(tag)) return true;
  }

  return criteria.olderThan !== null && entry.createdAt < criteria.olderThan;
}

/** @throws InvalidPatternError when `pattern` is not a valid regular expression */
export function invalidateCacheEntries<T extends object>(
  cache: EntryMap<T>,
  { pattern, tags, olderThan }: InvalidationCriteria
): number {
  const regex = pattern ? compilePattern(pattern) : null;
  const tagSet = new Set(tags ?? []);
  const olderThanMs =
    olderThan === undefined
      ? null
      : olderThan instanceof Date
        ? olderThan.getTime()
        : olderThan;

  if (!regex && tagSet.size === 0 && olderThanMs === null) {
    return 0;
  }

  const keysToDelete: string[] = [];
  for (const [key, entry] of cache.entries()) {
    if (matchesInvalidation(entry, { regex, tags: tagSet, olderThan: olderThanMs })) {
      keysToDelete.push(key);
    }
  }

  for (const key of keysToDelete) {
    cache.delete(key);
  }

  return keysToDelete.length;
}
