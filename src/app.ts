/**
 * HTTP Application
 *
 * Hono app exposing the answer engine. Everything under /api requires the
 * X-API-Key header; /health is open.
 *
 * @version 1.0.0
 */

import { timingSafeEqual } from 'node:crypto';
import { Hono } from 'hono';
import type { Context, Next } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import packageJson from '../package.json';
import type { ConfigStatus } from './lib/config-parser';
import { handleUnauthorizedError } from './lib/error-handler';
import { logger } from './lib/logger';
import { createCacheAdminRouter } from './routes/cache-admin';
import { createChatRouter } from './routes/chat';
import { createFallbackRouter } from './routes/fallback';
import type { AnswerOrchestrator } from './services/assistant/answer-orchestrator';
import type { GenerateServiceStats } from './services/generate/generate-service';

export interface AppOptions {
  orchestrator: AnswerOrchestrator;
  /** null blocks every /api request */
  apiSecret: string | null;
  allowedOrigins?: string[];
  requestLogging?: boolean;
  /** reported by GET /health when given */
  configStatus?: () => ConfigStatus;
  generatorStats?: () => GenerateServiceStats;
}

/** Timing-safe API key verification */
export function verifyApiKey(provided: string | undefined, expected: string | null): boolean {
  if (!expected) {
    logger.error('[Security] ASSISTANT_API_SECRET is not configured - blocking request');
    return false;
  }
  if (!provided || provided.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(provided), Buffer.from(expected));
}

export function createApp(options: AppOptions): Hono {
  const {
    orchestrator,
    apiSecret,
    allowedOrigins = [],
    requestLogging = true,
    configStatus,
    generatorStats,
  } = options;
  const app = new Hono();

  if (requestLogging) {
    app.use('*', honoLogger());
  }
  if (allowedOrigins.length > 0) {
    app.use('*', cors({ origin: allowedOrigins }));
  }

  // fail-closed
  app.use('/api/*', async (c: Context, next: Next) => {
    if (!verifyApiKey(c.req.header('X-API-Key'), apiSecret)) {
      return handleUnauthorizedError(c);
    }
    await next();
  });

  app.onError((err: Error, c: Context) => {
    logger.error({ err, url: c.req.url, method: c.req.method }, 'Unhandled error');

    return c.json(
      {
        success: false,
        error: 'Internal Server Error',
        code: 'INTERNAL_ERROR',
        timestamp: new Date().toISOString(),
      },
      500
    );
  });

  /**
   * GET /health - Health Check
   */
  app.get('/health', (c: Context) => {
    const health = orchestrator.getHealth();
    return c.json({
      status: 'ok',
      service: 'maintenance-assistant',
      version: packageJson.version,
      config: configStatus?.(),
      generator: generatorStats?.(),
      cache: health.cache.status,
      fallback: health.fallback.status,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/chat', createChatRouter(orchestrator));
  app.route('/api/cache', createCacheAdminRouter(orchestrator));
  app.route('/api/fallback', createFallbackRouter(orchestrator));

  return app;
}
