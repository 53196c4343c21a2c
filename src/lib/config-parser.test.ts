/**
 * Config Parser Unit Tests
 */
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { clearConfigCache, getAppConfig, getConfigStatus, parseEnvConfig } from './config-parser';

describe('Config Parser', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    clearConfigCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearConfigCache();
  });

  // ============================================================================
  // 1. parseEnvConfig
  // ============================================================================
  describe('parseEnvConfig', () => {
    it('applies defaults', () => {
      expect(parseEnvConfig({})).toMatchObject({
        PORT: 8080,
        GEMINI_MODEL: 'gemini-2.5-flash',
        LLM_TIMEOUT_MS: 30_000,
        CACHE_MAX_SIZE: 1000,
        CACHE_BASE_TTL_SECONDS: 3600,
        CACHE_SIMILARITY_THRESHOLD: 0.8,
        LOW_CONFIDENCE_THRESHOLD: 0.3,
      });
    });

    it('coerces numeric strings', () => {
      const config = parseEnvConfig({ PORT: '3000', CACHE_SIMILARITY_THRESHOLD: '0.9' });
      expect(config.PORT).toBe(3000);
      expect(config.CACHE_SIMILARITY_THRESHOLD).toBe(0.9);
    });

    it('treats blank values as unset', () => {
      const config = parseEnvConfig({ PORT: '  ', ASSISTANT_API_SECRET: '' });
      expect(config.PORT).toBe(8080);
      expect(config.ASSISTANT_API_SECRET).toBeUndefined();
    });

    it('rejects out-of-range values', () => {
      expect(() => parseEnvConfig({ CACHE_SIMILARITY_THRESHOLD: '1.5' })).toThrow(
        /Invalid environment configuration: CACHE_SIMILARITY_THRESHOLD/
      );
      expect(() => parseEnvConfig({ PORT: 'eighty' })).toThrow(/PORT/);
    });
  });

  // ============================================================================
  // 2. getAppConfig
  // ============================================================================
  describe('getAppConfig', () => {
    it('groups settings and splits allowed origins', () => {
      process.env.ASSISTANT_API_SECRET = 'test-secret';
      process.env.ALLOWED_ORIGINS = 'http://localhost:3000, http://example.test';
      process.env.CACHE_MAX_SIZE = '50';
      delete process.env.PORT;

      const config = getAppConfig();

      expect(config.server).toEqual({
        port: 8080,
        allowedOrigins: ['http://localhost:3000', 'http://example.test'],
        apiSecret: 'test-secret',
      });
      expect(config.cache.maxSize).toBe(50);
    });

    it('caches until clearConfigCache', () => {
      process.env.GEMINI_MODEL = 'model-a';
      expect(getAppConfig().llm.model).toBe('model-a');

      process.env.GEMINI_MODEL = 'model-b';
      expect(getAppConfig().llm.model).toBe('model-a');

      clearConfigCache();
      expect(getAppConfig().llm.model).toBe('model-b');
    });
  });

  describe('getConfigStatus', () => {
    it('reports presence of secrets without their values', () => {
      process.env.ASSISTANT_API_SECRET = 'test-secret';
      delete process.env.GOOGLE_GENERATIVE_AI_API_KEY;

      const status = getConfigStatus();

      expect(status).toMatchObject({ apiSecret: true, gemini: false });
      expect(JSON.stringify(status)).not.toContain('test-secret');
    });
  });
});
