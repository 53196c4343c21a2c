/**
 * Configuration Parser
 *
 * Environment variables parsed and bounded with zod; the result is cached
 * until `clearConfigCache()`.
 *
 * @version 1.0.0
 */

import { z } from 'zod';
import { logger } from './logger';

// ============================================================================
// 1. Schema
// ============================================================================

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  ALLOWED_ORIGINS: z.string().optional(),
  ASSISTANT_API_SECRET: z.string().min(1).optional(),

  GOOGLE_GENERATIVE_AI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(1000),
  CACHE_BASE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  CACHE_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  CACHE_CLEANUP_INTERVAL_MS: z.coerce.number().int().min(0).default(300_000),

  LOW_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig {
  server: {
    port: number;
    allowedOrigins: string[];
    apiSecret: string | null;
  };
  llm: {
    apiKey: string | null;
    model: string;
    temperature: number;
    maxOutputTokens: number;
    timeoutMs: number;
    maxRetries: number;
  };
  cache: {
    maxSize: number;
    baseTtlSeconds: number;
    similarityThreshold: number;
    cleanupIntervalMs: number;
  };
  lowConfidenceThreshold: number;
}

// ============================================================================
// 2. Parsing
// ============================================================================

let cachedConfig: AppConfig | null = null;

/** Blank variables count as unset so schema defaults apply. */
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
}

export function getAppConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  const env = parseEnvConfig();

  cachedConfig = {
    server: {
      port: env.PORT,
      allowedOrigins: env.ALLOWED_ORIGINS
        ? env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
        : [],
      apiSecret: env.ASSISTANT_API_SECRET ?? null,
    },
    llm: {
      apiKey: env.GOOGLE_GENERATIVE_AI_API_KEY ?? null,
      model: env.GEMINI_MODEL,
      temperature: env.LLM_TEMPERATURE,
      maxOutputTokens: env.LLM_MAX_OUTPUT_TOKENS,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxRetries: env.LLM_MAX_RETRIES,
    },
    cache: {
      maxSize: env.CACHE_MAX_SIZE,
      baseTtlSeconds: env.CACHE_BASE_TTL_SECONDS,
      similarityThreshold: env.CACHE_SIMILARITY_THRESHOLD,
      cleanupIntervalMs: env.CACHE_CLEANUP_INTERVAL_MS,
    },
    lowConfidenceThreshold: env.LOW_CONFIDENCE_THRESHOLD,
  };

  if (!cachedConfig.server.apiSecret) {
    logger.warn('[Config] ASSISTANT_API_SECRET not set - /api routes will reject all requests');
  }

  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export interface ConfigStatus {
  apiSecret: boolean;
  gemini: boolean;
  model: string;
  cacheMaxSize: number;
}

/**
 * Secret-free summary for the health endpoint
 */
export function getConfigStatus(): ConfigStatus {
  const config = getAppConfig();
  return {
    apiSecret: config.server.apiSecret !== null,
    gemini: config.llm.apiKey !== null,
    model: config.llm.model,
    cacheMaxSize: config.cache.maxSize,
  };
}
