import type { CacheStrategy } from '../../lib/cache/response-cache.types';
import type { FallbackStrategy, FallbackTrigger } from '../fallback/fallback-types';

export type MaintenanceRecord = Readonly<Record<string, unknown>>;

export type AnswerContext = Readonly<Record<string, unknown>>;

export type AnswerSource = 'maintenance_records' | 'llm' | 'fallback_system' | 'emergency_fallback';

export interface GeneratorRequest {
  context: AnswerContext;
  records: readonly MaintenanceRecord[];
  signal: AbortSignal;
}

/** Black-box text generation: prompt in, answer text out. */
export type Generator = (prompt: string, request: GeneratorRequest) => Promise<string>;

export interface AnswerOptions {
  context?: AnswerContext;
  records?: readonly MaintenanceRecord[];
  /** caller-supplied confidence in [0, 1]; estimated when absent */
  confidence?: number;
  cacheStrategy?: CacheStrategy;
}

export interface AnswerResult {
  text: string;
  confidenceScore: number;
  sources: AnswerSource[];
  suggestions: string[];
  cacheUsed: boolean;
  cacheSimilarity?: boolean;
  fallbackUsed: boolean;
  fallbackReason?: FallbackTrigger | 'EMERGENCY';
  fallbackStrategy?: FallbackStrategy;
  actionable: boolean;
  processingTimeMs: number;
}

/** What the cache stores for a successful answer. */
export interface CachedAnswer {
  text: string;
  confidenceScore: number;
  sources: AnswerSource[];
  suggestions: string[];
}

export interface AnswerMetrics {
  totalQueries: number;
  cacheHits: number;
  llmCalls: number;
  successfulAnswers: number;
  fallbackAnswers: number;
  emergencyAnswers: number;
  averageProcessingTimeMs: number;
}

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}
