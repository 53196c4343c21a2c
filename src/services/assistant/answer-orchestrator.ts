/**
 * Answer Orchestrator
 *
 * Composes the response cache, the generator and the fallback layer:
 *
 *   validate input -> cache lookup -> generate (timeout) -> confidence gate
 *   -> response validation -> fallback | cache write -> result
 *
 * `answer` rejects only for invalid caller input; every other failure
 * ends in a fallback or emergency result.
 *
 * @version 1.0.0
 */

import { z } from 'zod';
import { ResponseCache, type CacheConfigUpdate } from '../../lib/cache/response-cache';
import type {
  CacheContext,
  CacheEntryInfo,
  CacheHealth,
  CacheMetrics,
  ResponseCacheConfig,
} from '../../lib/cache/response-cache.types';
import { logger } from '../../lib/logger';
import { withTimeout } from '../../lib/with-timeout';
import { FallbackResponder, createEmergencyFallback } from '../fallback/fallback-responder';
import { suggestFollowUps } from '../fallback/fallback-templates';
import type {
  FallbackFeedback,
  FallbackHealth,
  FallbackMetrics,
  FallbackTrigger,
} from '../fallback/fallback-types';
import { validateResponse } from '../fallback/response-validator';
import {
  InvalidQueryError,
  type AnswerContext,
  type AnswerMetrics,
  type AnswerOptions,
  type AnswerResult,
  type AnswerSource,
  type CachedAnswer,
  type Generator,
  type MaintenanceRecord,
} from './answer-types';
import { deriveCacheTags } from './cache-tags';
import { estimateConfidence } from './confidence';
import { classifyGenerationError } from './error-classifier';
import { buildUserPrompt } from './prompt-builder';

const orchestratorLogger = logger.child({ component: 'answer-orchestrator' });

// ============================================================================
// 1. Configuration
// ============================================================================

export const MAX_QUERY_CHARS = 2000;
export const MAX_RESPONSE_CHARS = 5000;
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;
export const DEFAULT_LOW_CONFIDENCE_THRESHOLD = 0.3;
const TRUNCATION_SUFFIX = '... [truncated]';

export interface AnswerOrchestratorOptions {
  generator: Generator;
  cache?: ResponseCache<CachedAnswer>;
  fallback?: FallbackResponder;
  timeoutMs?: number;
  lowConfidenceThreshold?: number;
}

export interface OrchestratorInvalidation {
  pattern?: string;
  tags?: string[];
  olderThanHours?: number;
}

export interface OrchestratorConfigUpdate {
  maxSize?: number;
  /** seconds, base of the TTL formula */
  defaultTtl?: number;
  similarityThreshold?: number;
}

export interface OrchestratorMetrics {
  answers: AnswerMetrics;
  cache: CacheMetrics;
  fallback: FallbackMetrics;
}

export interface OrchestratorHealth {
  status: 'healthy' | 'warning' | 'critical';
  cache: CacheHealth;
  fallback: FallbackHealth;
}

const answerInputSchema = z.object({
  query: z
    .string()
    .refine((value) => value.trim().length > 0, 'query must not be blank')
    .refine((value) => value.length <= MAX_QUERY_CHARS, `query exceeds ${MAX_QUERY_CHARS} characters`),
  confidence: z.number().min(0).max(1).optional(),
});

const HEALTH_RANK = { healthy: 0, warning: 1, critical: 2 } as const;

function truncateResponse(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length <= MAX_RESPONSE_CHARS) return trimmed;
  return `${trimmed.slice(0, MAX_RESPONSE_CHARS)}${TRUNCATION_SUFFIX}`;
}

// ============================================================================
// 2. Orchestrator
// ============================================================================

export class AnswerOrchestrator {
  private readonly generator: Generator;
  private readonly cache: ResponseCache<CachedAnswer>;
  private readonly fallback: FallbackResponder;
  private readonly timeoutMs: number;
  private readonly lowConfidenceThreshold: number;

  private totalQueries = 0;
  private cacheHits = 0;
  private llmCalls = 0;
  private successfulAnswers = 0;
  private fallbackAnswers = 0;
  private emergencyAnswers = 0;
  private totalProcessingTimeMs = 0;

  constructor(options: AnswerOrchestratorOptions) {
    this.generator = options.generator;
    this.cache = options.cache ?? new ResponseCache<CachedAnswer>();
    this.fallback = options.fallback ?? new FallbackResponder();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.lowConfidenceThreshold = options.lowConfidenceThreshold ?? DEFAULT_LOW_CONFIDENCE_THRESHOLD;
  }

  /**
   * @throws InvalidQueryError synchronously for a blank or oversized query,
   * or a confidence outside [0, 1]
   */
  answer(query: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const parsed = answerInputSchema.safeParse({ query, confidence: options.confidence });
    if (!parsed.success) {
      throw new InvalidQueryError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    return this.process(query, options);
  }

  private async process(query: string, options: AnswerOptions): Promise<AnswerResult> {
    const startedAt = Date.now();
    const context = options.context ?? {};
    const records = options.records ?? [];
    this.totalQueries++;

    try {
      const cached = this.lookupCache(query, context, options);
      if (cached) {
        this.cacheHits++;
        return this.finish(
          {
            text: cached.text,
            confidenceScore: cached.confidenceScore,
            sources: [...cached.sources],
            suggestions: [...cached.suggestions],
            cacheUsed: true,
            cacheSimilarity: cached.cacheSimilarity,
            fallbackUsed: false,
            actionable: true,
          },
          startedAt
        );
      }

      let text: string;
      try {
        text = await this.generate(query, context, records);
      } catch (error) {
        const trigger = classifyGenerationError(error);
        orchestratorLogger.warn({ err: error, trigger }, 'Generation failed, using fallback');
        return this.finish(this.fallbackResult(trigger, query, context), startedAt);
      }

      const confidence = options.confidence ?? estimateConfidence(records, text);
      const trigger = this.checkAnswer(text, query, confidence);
      if (trigger) {
        return this.finish(this.fallbackResult(trigger, query, context), startedAt);
      }

      const answer: CachedAnswer = {
        text: truncateResponse(text),
        confidenceScore: confidence,
        sources: records.length > 0 ? ['maintenance_records', 'llm'] : ['llm'],
        suggestions: suggestFollowUps(query),
      };
      this.storeAnswer(query, answer, context, records.length);
      this.successfulAnswers++;

      return this.finish(
        {
          ...answer,
          sources: [...answer.sources],
          suggestions: [...answer.suggestions],
          cacheUsed: false,
          fallbackUsed: false,
          actionable: true,
        },
        startedAt
      );
    } catch (error) {
      orchestratorLogger.error({ err: error, query: query.slice(0, 100) }, 'Answer pipeline failed, using emergency response');
      return this.finish(this.emergencyResult(), startedAt);
    }
  }

  // --------------------------------------------------------------------------
  // 2.1 Pipeline steps
  // --------------------------------------------------------------------------

  private lookupCache(query: string, context: AnswerContext, options: AnswerOptions) {
    try {
      return this.cache.get(query, { context, strategy: options.cacheStrategy });
    } catch (error) {
      orchestratorLogger.warn({ err: error }, 'Cache lookup failed, treating as miss');
      return null;
    }
  }

  private async generate(
    query: string,
    context: AnswerContext,
    records: readonly MaintenanceRecord[]
  ): Promise<string> {
    this.llmCalls++;
    const controller = new AbortController();
    const prompt = buildUserPrompt(query, records, context);

    return withTimeout(
      this.generator(prompt, { context, records, signal: controller.signal }),
      this.timeoutMs,
      `Generation timed out after ${this.timeoutMs}ms`,
      controller
    );
  }

  private checkAnswer(text: string, query: string, confidence: number): FallbackTrigger | null {
    if (confidence < this.lowConfidenceThreshold) {
      orchestratorLogger.info({ confidence }, 'Confidence below threshold');
      return 'LOW_CONFIDENCE';
    }

    const validation = validateResponse(text, query);
    if (!validation.isValid) {
      orchestratorLogger.info({ check: validation.check, trigger: validation.trigger }, 'Response failed validation');
      return validation.trigger;
    }

    return null;
  }

  private storeAnswer(query: string, answer: CachedAnswer, context: CacheContext, recordCount: number): void {
    try {
      this.cache.set(query, answer, {
        context,
        confidence: answer.confidenceScore,
        recordCount,
        tags: deriveCacheTags(query, recordCount, context),
      });
    } catch (error) {
      orchestratorLogger.warn({ err: error }, 'Cache write failed');
    }
  }

  private fallbackResult(
    trigger: FallbackTrigger,
    query: string,
    context: AnswerContext
  ): Omit<AnswerResult, 'processingTimeMs'> {
    const response = this.fallback.generate(trigger, query, context);
    this.fallbackAnswers++;

    return {
      text: response.message,
      confidenceScore: response.confidence,
      sources: ['fallback_system'],
      suggestions: response.suggestions,
      cacheUsed: false,
      fallbackUsed: true,
      fallbackReason: trigger,
      fallbackStrategy: response.strategyUsed,
      actionable: response.actionable,
    };
  }

  private emergencyResult(): Omit<AnswerResult, 'processingTimeMs'> {
    const response = createEmergencyFallback('LLM_ERROR');
    this.emergencyAnswers++;
    const sources: AnswerSource[] = ['emergency_fallback'];

    return {
      text: response.message,
      confidenceScore: response.confidence,
      sources,
      suggestions: response.suggestions,
      cacheUsed: false,
      fallbackUsed: true,
      fallbackReason: 'EMERGENCY',
      fallbackStrategy: response.strategyUsed,
      actionable: response.actionable,
    };
  }

  private finish(result: Omit<AnswerResult, 'processingTimeMs'>, startedAt: number): AnswerResult {
    const processingTimeMs = Date.now() - startedAt;
    this.totalProcessingTimeMs += processingTimeMs;
    return { ...result, processingTimeMs };
  }

  // --------------------------------------------------------------------------
  // 2.2 Administration
  // --------------------------------------------------------------------------

  getMetrics(): OrchestratorMetrics {
    return {
      answers: {
        totalQueries: this.totalQueries,
        cacheHits: this.cacheHits,
        llmCalls: this.llmCalls,
        successfulAnswers: this.successfulAnswers,
        fallbackAnswers: this.fallbackAnswers,
        emergencyAnswers: this.emergencyAnswers,
        averageProcessingTimeMs:
          this.totalQueries > 0 ? Math.round(this.totalProcessingTimeMs / this.totalQueries) : 0,
      },
      cache: this.cache.metrics(),
      fallback: this.fallback.getMetrics(),
    };
  }

  getHealth(): OrchestratorHealth {
    const cache = this.cache.getHealth();
    const fallback = this.fallback.getHealth();
    const status = HEALTH_RANK[cache.status] >= HEALTH_RANK[fallback.status] ? cache.status : fallback.status;
    return { status, cache, fallback };
  }

  getCacheInfo(query: string, context?: CacheContext): CacheEntryInfo {
    return this.cache.getInfo(query, context);
  }

  /** @throws InvalidPatternError for a malformed `pattern` */
  invalidate({ pattern, tags, olderThanHours }: OrchestratorInvalidation): number {
    return this.cache.invalidate({
      pattern,
      tags,
      olderThan: olderThanHours === undefined ? undefined : Date.now() - olderThanHours * 3600 * 1000,
    });
  }

  clear(): void {
    this.cache.clear();
  }

  /** @throws CacheConfigError for a non-positive maxSize or TTL, or a threshold outside [0, 1] */
  configure(update: OrchestratorConfigUpdate): ResponseCacheConfig {
    const cacheUpdate: CacheConfigUpdate = {
      maxSize: update.maxSize,
      baseTtlSeconds: update.defaultTtl,
      similarityThreshold: update.similarityThreshold,
    };
    return this.cache.configure(cacheUpdate);
  }

  recordFeedback(feedback: FallbackFeedback): void {
    this.fallback.recordFeedback(feedback);
  }

  shutdown(): void {
    this.cache.stopCleanup();
    orchestratorLogger.info('Answer orchestrator stopped');
  }
}
