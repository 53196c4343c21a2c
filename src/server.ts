/**
 * Maintenance Assistant Server
 *
 * Wires the answer engine and starts the HTTP server. `load-env` is
 * imported first so .env values are in place before the logger reads
 * LOG_LEVEL.
 */

import { loadedEnvFiles } from './lib/load-env';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { getAppConfig, getConfigStatus } from './lib/config-parser';
import { logger } from './lib/logger';
import { ResponseCache } from './lib/cache/response-cache';
import { AnswerOrchestrator } from './services/assistant/answer-orchestrator';
import type { CachedAnswer } from './services/assistant/answer-types';
import { GenerateService } from './services/generate/generate-service';
import { registerGracefulShutdownHandlers } from './server-shutdown';

const config = getAppConfig();

const generateService = new GenerateService({
  apiKey: config.llm.apiKey,
  model: config.llm.model,
  temperature: config.llm.temperature,
  maxOutputTokens: config.llm.maxOutputTokens,
  maxRetries: config.llm.maxRetries,
});

const orchestrator = new AnswerOrchestrator({
  generator: generateService.asGenerator(),
  cache: new ResponseCache<CachedAnswer>({
    ...config.cache,
    namespace: config.llm.model,
  }),
  timeoutMs: config.llm.timeoutMs,
  lowConfidenceThreshold: config.lowConfidenceThreshold,
});

const app = createApp({
  orchestrator,
  apiSecret: config.server.apiSecret,
  allowedOrigins: config.server.allowedOrigins,
  configStatus: getConfigStatus,
  generatorStats: () => generateService.getStats(),
});

const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  logger.info(
    { port: info.port, model: config.llm.model, envFiles: loadedEnvFiles.length },
    'Maintenance assistant listening'
  );
});

registerGracefulShutdownHandlers(server, orchestrator);
