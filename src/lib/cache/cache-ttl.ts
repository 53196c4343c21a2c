import type { CacheEntryStatus } from './response-cache.types';

export const DEFAULT_BASE_TTL_SECONDS = 3600;
export const MIN_DYNAMIC_TTL_SECONDS = 1800;
export const MAX_DYNAMIC_TTL_SECONDS = 14_400;
const STALE_RATIO = 0.75;

/**
 * TTL for a generated answer.
 *
 * `base * (0.5 + 1.5 * confidence) * (1 + min(0.5, records / 20))`,
 * clamped to [30 min, 4 h].
 */
export function calculateCacheTtl(
  confidence: number,
  recordCount: number,
  baseTtlSeconds = DEFAULT_BASE_TTL_SECONDS
): number {
  const boundedConfidence = Math.min(1, Math.max(0, confidence));
  const confidenceMultiplier = 0.5 + boundedConfidence * 1.5;
  const dataVolumeMultiplier = 1 + Math.min(0.5, Math.max(0, recordCount) / 20);

  const ttl = Math.floor(baseTtlSeconds * confidenceMultiplier * dataVolumeMultiplier);

  return Math.max(MIN_DYNAMIC_TTL_SECONDS, Math.min(MAX_DYNAMIC_TTL_SECONDS, ttl));
}

interface TimedEntry {
  createdAt: number;
  ttlSeconds: number;
}

export function getExpiresAt(entry: TimedEntry): number {
  return entry.createdAt + entry.ttlSeconds * 1000;
}

export function isEntryExpired(entry: TimedEntry, now = Date.now()): boolean {
  return now - entry.createdAt > entry.ttlSeconds * 1000;
}

export function getEntryStatus(entry: TimedEntry, now = Date.now()): CacheEntryStatus {
  if (isEntryExpired(entry, now)) return 'EXPIRED';
  const elapsed = now - entry.createdAt;
  if (elapsed >= entry.ttlSeconds * 1000 * STALE_RATIO) return 'STALE';
  return 'FRESH';
}
