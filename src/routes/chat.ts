/**
 * Chat Routes
 *
 * Question answering over maintenance records.
 *
 * @version 1.0.0
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { handleApiError, handleValidationError } from '../lib/error-handler';
import type { AnswerOrchestrator } from '../services/assistant/answer-orchestrator';
import { InvalidQueryError } from '../services/assistant/answer-types';
import { parseJsonBody } from './request-body';

const chatRequestSchema = z.object({
  query: z.string({ required_error: 'query is required' }),
  context: z.record(z.string(), z.unknown()).optional(),
  records: z.array(z.record(z.string(), z.unknown())).optional(),
  confidence: z.number().optional(),
  cacheStrategy: z.enum(['EXACT_MATCH', 'NORMALIZED_MATCH']).optional(),
});

export function createChatRouter(orchestrator: AnswerOrchestrator): Hono {
  const router = new Hono();

  /**
   * POST /chat - Answer a question
   */
  router.post('/', async (c: Context) => {
    const body = await parseJsonBody(c, chatRequestSchema);
    if (!body.success) {
      return handleValidationError(c, body.error);
    }

    try {
      const { query, ...options } = body.data;
      const result = await orchestrator.answer(query, options);
      return c.json(result);
    } catch (error) {
      if (error instanceof InvalidQueryError) {
        return handleValidationError(c, error.message);
      }
      return handleApiError(c, error, 'Chat');
    }
  });

  return router;
}
