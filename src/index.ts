export {
  CacheConfigError,
  DEFAULT_RESPONSE_CACHE_CONFIG,
  InvalidPatternError,
  ResponseCache,
} from './lib/cache/response-cache';
export type { CacheConfigUpdate } from './lib/cache/response-cache';
export type {
  CacheContext,
  CacheEntryInfo,
  CacheEntryStatus,
  CacheHealth,
  CacheHit,
  CacheLookupOptions,
  CacheMetrics,
  CacheSetOptions,
  CacheStrategy,
  InvalidationCriteria,
  ResponseCacheConfig,
} from './lib/cache/response-cache.types';
export { normalizeQuery } from './lib/cache/query-normalizer';
export { calculateQuerySimilarity } from './lib/cache/similarity';
export { calculateCacheTtl } from './lib/cache/cache-ttl';
export { validateResponse } from './services/fallback/response-validator';
export type { ValidationResult } from './services/fallback/response-validator';
export { FallbackResponder } from './services/fallback/fallback-responder';
export type {
  FallbackContext,
  FallbackFeedback,
  FallbackHealth,
  FallbackMetrics,
  FallbackResponse,
  FallbackStrategy,
  FallbackTrigger,
} from './services/fallback/fallback-types';
export { FALLBACK_TRIGGERS } from './services/fallback/fallback-types';
export { AnswerOrchestrator } from './services/assistant/answer-orchestrator';
export type { AnswerOrchestratorOptions } from './services/assistant/answer-orchestrator';
export { InvalidQueryError } from './services/assistant/answer-types';
export type {
  AnswerOptions,
  AnswerResult,
  CachedAnswer,
  Generator,
  MaintenanceRecord,
} from './services/assistant/answer-types';
export { GenerateService } from './services/generate/generate-service';
export { createApp } from './app';
