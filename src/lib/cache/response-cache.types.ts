export type CacheStrategy = 'EXACT_MATCH' | 'NORMALIZED_MATCH';

export type CacheEntryStatus = 'FRESH' | 'STALE' | 'EXPIRED';

export type CacheContext = Readonly<Record<string, unknown>>;

export interface ResponseCacheEntry<T extends object> {
  key: string;
  /** hash of the context fields that scope similarity lookups */
  contextKey: string;
  originalQuery: string;
  normalizedQuery: string;
  response: T;
  createdAt: number;
  lastAccessedAt: number;
  accessCount: number;
  ttlSeconds: number;
  tags: Set<string>;
  confidenceScore: number;
}

export interface ResponseCacheConfig {
  maxSize: number;
  /** base of the dynamic TTL formula, seconds */
  baseTtlSeconds: number;
  similarityThreshold: number;
  /** 0 disables the background sweep */
  cleanupIntervalMs: number;
  /** folded into every key, e.g. the model id */
  namespace: string;
  /** context fields that take part in the key */
  contextKeys: readonly string[];
}

export interface CacheLookupOptions {
  context?: CacheContext;
  strategy?: CacheStrategy;
}

export interface CacheSetOptions {
  context?: CacheContext;
  /** explicit TTL, bypasses the formula and its clamp */
  ttlSeconds?: number;
  tags?: Iterable<string>;
  /** defaults to the payload's `confidenceScore`, else 0.5 */
  confidence?: number;
  recordCount?: number;
}

export interface InvalidationCriteria {
  /** case-insensitive regex applied to the original query */
  pattern?: string;
  tags?: Iterable<string>;
  olderThan?: Date | number;
}

export interface CacheHitMarkers {
  cacheUsed: true;
  cacheSimilarity: boolean;
  cacheStatus: CacheEntryStatus;
  cacheAgeSeconds: number;
  cacheKey: string;
}

export type CacheHit<T extends object> = T & CacheHitMarkers;

export interface CacheMetrics {
  totalRequests: number;
  hits: number;
  misses: number;
  hitRate: number;
  missRate: number;
  size: number;
  maxSize: number;
  expiredCount: number;
  staleCount: number;
  /** MB, rough JSON size of the stored payloads */
  memoryEstimate: number;
  averageResponseSize: number;
  evictionCount: number;
}

export type CacheHealthStatus = 'healthy' | 'warning' | 'critical';

export interface CacheHealth {
  status: CacheHealthStatus;
  hitRate: number;
  utilization: number;
  memoryEstimate: number;
  expiredCount: number;
  staleCount: number;
  recommendations: string[];
}

export interface SimilarEntryInfo {
  query: string;
  similarity: number;
  status: CacheEntryStatus;
}

export interface CacheEntryInfo {
  cacheKey: string;
  normalizedQuery: string;
  existsInCache: boolean;
  status?: CacheEntryStatus;
  createdAt?: string;
  expiresAt?: string;
  lastAccessedAt?: string;
  accessCount?: number;
  ttlSeconds?: number;
  tags?: string[];
  similarEntries: SimilarEntryInfo[];
}
