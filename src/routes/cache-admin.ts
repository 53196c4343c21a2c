/**
 * Cache Administration Routes
 *
 * Metrics, health, inspection, invalidation and tuning of the response
 * cache.
 *
 * @version 1.0.0
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { handleApiError, handleValidationError, jsonSuccess, jsonSuccessData } from '../lib/error-handler';
import type { AnswerOrchestrator } from '../services/assistant/answer-orchestrator';
import { parseJsonBody } from './request-body';

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

const invalidateSchema = z.object({
  pattern: z.string().min(1).refine(isValidPattern, 'pattern is not a valid regular expression').optional(),
  tags: z.array(z.string().min(1)).optional(),
  olderThanHours: z.number().positive().optional(),
});

const configureSchema = z
  .object({
    maxSize: z.number().int().positive().optional(),
    defaultTtl: z.number().int().positive().optional(),
    similarityThreshold: z.number().min(0).max(1).optional(),
  })
  .refine(
    (value) => Object.values(value).some((field) => field !== undefined),
    'at least one of maxSize, defaultTtl, similarityThreshold is required'
  );

export function createCacheAdminRouter(orchestrator: AnswerOrchestrator): Hono {
  const router = new Hono();

  /**
   * GET /cache/metrics - Answer, cache and fallback counters
   */
  router.get('/metrics', (c: Context) => jsonSuccess(c, orchestrator.getMetrics()));

  /**
   * GET /cache/health - Health status with recommendations
   */
  router.get('/health', (c: Context) => jsonSuccess(c, orchestrator.getHealth()));

  /**
   * GET /cache/info?query= - Key, status and similar entries for a query
   */
  router.get('/info', (c: Context) => {
    const query = c.req.query('query');
    if (!query || query.trim().length === 0) {
      return handleValidationError(c, 'query parameter is required');
    }
    return jsonSuccessData(c, orchestrator.getCacheInfo(query));
  });

  /**
   * POST /cache/invalidate - Remove entries by pattern, tags or age
   */
  router.post('/invalidate', async (c: Context) => {
    const body = await parseJsonBody(c, invalidateSchema);
    if (!body.success) {
      return handleValidationError(c, body.error);
    }

    try {
      const removed = orchestrator.invalidate(body.data);
      return jsonSuccess(c, { removed });
    } catch (error) {
      return handleApiError(c, error, 'Cache Invalidate');
    }
  });

  /**
   * POST /cache/clear - Drop every entry
   */
  router.post('/clear', (c: Context) => {
    orchestrator.clear();
    return jsonSuccess(c, { cleared: true });
  });

  /**
   * POST /cache/configure - Adjust capacity, base TTL and similarity threshold
   */
  router.post('/configure', async (c: Context) => {
    const body = await parseJsonBody(c, configureSchema);
    if (!body.success) {
      return handleValidationError(c, body.error);
    }

    const config = orchestrator.configure(body.data);
    return jsonSuccess(c, {
      config: {
        maxSize: config.maxSize,
        defaultTtl: config.baseTtlSeconds,
        similarityThreshold: config.similarityThreshold,
      },
    });
  });

  return router;
}
