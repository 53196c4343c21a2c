/**
 * Fallback Monitoring Routes
 *
 * @version 1.0.0
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { handleValidationError, jsonSuccess } from '../lib/error-handler';
import type { AnswerOrchestrator } from '../services/assistant/answer-orchestrator';
import { parseJsonBody } from './request-body';

const feedbackSchema = z.object({
  responseId: z.string().min(1),
  rating: z.number().int().min(1).max(5),
  comments: z.string().max(1000).optional(),
});

export function createFallbackRouter(orchestrator: AnswerOrchestrator): Hono {
  const router = new Hono();

  /**
   * GET /fallback/metrics - Fallback counters and health
   */
  router.get('/metrics', (c: Context) => {
    const { fallback } = orchestrator.getMetrics();
    const { fallback: health } = orchestrator.getHealth();
    return jsonSuccess(c, { metrics: fallback, health });
  });

  /**
   * POST /fallback/feedback - Rate a fallback answer (1-5)
   */
  router.post('/feedback', async (c: Context) => {
    const body = await parseJsonBody(c, feedbackSchema);
    if (!body.success) {
      return handleValidationError(c, body.error);
    }

    orchestrator.recordFeedback(body.data);
    return jsonSuccess(c, { recorded: true });
  });

  return router;
}
