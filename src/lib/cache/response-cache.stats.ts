import { getEntryStatus } from './cache-ttl';
import type {
  CacheHealth,
  CacheMetrics,
  ResponseCacheEntry,
} from './response-cache.types';

export interface ResponseCacheStatsState {
  totalRequests: number;
  hits: number;
  misses: number;
  evictions: number;
}

export function createInitialStatsState(): ResponseCacheStatsState {
  return {
    totalRequests: 0,
    hits: 0,
    misses: 0,
    evictions: 0,
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function estimatePayloadSize(payload: unknown): number {
  try {
    return JSON.stringify(payload)?.length ?? 0;
  } catch {
    // circular or BigInt payloads
    return String(payload).length;
  }
}

export function buildCacheMetrics<T extends object>(
  stats: ResponseCacheStatsState,
  cache: Map<string, ResponseCacheEntry<T>>,
  maxSize: number,
  now = Date.now()
): CacheMetrics {
  let expiredCount = 0;
  let staleCount = 0;
  let totalSize = 0;

  for (const entry of cache.values()) {
    const status = getEntryStatus(entry, now);
    if (status === 'EXPIRED') expiredCount++;
    else if (status === 'STALE') staleCount++;
    totalSize += estimatePayloadSize(entry.response);
  }

  const { totalRequests } = stats;

  return {
    totalRequests,
    hits: stats.hits,
    misses: stats.misses,
    hitRate: totalRequests > 0 ? round(stats.hits / totalRequests, 3) : 0,
    missRate: totalRequests > 0 ? round(stats.misses / totalRequests, 3) : 0,
    size: cache.size,
    maxSize,
    expiredCount,
    staleCount,
    memoryEstimate: round(totalSize / (1024 * 1024), 2),
    averageResponseSize: cache.size > 0 ? round(totalSize / cache.size, 1) : 0,
    evictionCount: stats.evictions,
  };
}

export function buildCacheHealth(metrics: CacheMetrics): CacheHealth {
  const utilization = metrics.maxSize > 0 ? metrics.size / metrics.maxSize : 0;

  let status: CacheHealth['status'];
  if (metrics.hitRate >= 0.6 && utilization < 0.9) {
    status = 'healthy';
  } else if (metrics.hitRate >= 0.3) {
    status = 'warning';
  } else {
    status = 'critical';
  }

  const recommendations: string[] = [];
  if (metrics.hitRate < 0.3) {
    recommendations.push('Low hit rate - consider lowering the similarity threshold');
  }
  if (utilization > 0.9) {
    recommendations.push('Cache almost full - consider raising maxSize');
  }
  if (metrics.expiredCount > metrics.size * 0.2) {
    recommendations.push('Many expired entries - consider a shorter cleanup interval');
  }
  if (metrics.memoryEstimate > 100) {
    recommendations.push('High memory estimate - consider a smaller maxSize');
  }

  return {
    status,
    hitRate: metrics.hitRate,
    utilization: round(utilization, 3),
    memoryEstimate: metrics.memoryEstimate,
    expiredCount: metrics.expiredCount,
    staleCount: metrics.staleCount,
    recommendations,
  };
}
