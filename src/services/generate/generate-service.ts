/**
 * Generate Service
 *
 * Default text generator on the AI SDK with the Google Gemini provider.
 * Errors propagate: the orchestrator classifies them into fallback
 * triggers.
 *
 * @version 1.0.0
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { generateText } from 'ai';
import { logger } from '../../lib/logger';
import type { Generator } from '../assistant/answer-types';
import { MAINTENANCE_SYSTEM_PROMPT } from '../assistant/prompt-builder';

export interface GenerateServiceConfig {
  apiKey: string | null;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  maxRetries: number;
  system?: string;
}

export interface GenerateStats {
  requests: number;
  successes: number;
  errors: number;
  totalTokens: number;
}

export interface GenerateServiceStats extends GenerateStats {
  successRate: number;
  provider: string;
  model: string;
}

const generateLogger = logger.child({ component: 'generate-service' });

export class GenerateService {
  private readonly config: GenerateServiceConfig;
  private google: ReturnType<typeof createGoogleGenerativeAI> | null = null;

  private stats: GenerateStats = {
    requests: 0,
    successes: 0,
    errors: 0,
    totalTokens: 0,
  };

  constructor(config: GenerateServiceConfig) {
    this.config = config;
  }

  /**
   * Gemini provider (lazy initialization)
   */
  private getGoogle(): ReturnType<typeof createGoogleGenerativeAI> {
    if (this.google) return this.google;

    if (!this.config.apiKey) {
      throw new Error('GOOGLE_GENERATIVE_AI_API_KEY not configured: model provider unavailable');
    }

    this.google = createGoogleGenerativeAI({ apiKey: this.config.apiKey });
    return this.google;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const startTime = Date.now();
    this.stats.requests++;

    try {
      const google = this.getGoogle();
      const { text, usage } = await generateText({
        model: google(this.config.model),
        system: this.config.system ?? MAINTENANCE_SYSTEM_PROMPT,
        prompt,
        temperature: this.config.temperature,
        maxOutputTokens: this.config.maxOutputTokens,
        maxRetries: this.config.maxRetries,
        abortSignal: signal,
      });

      const totalTokens = (usage.inputTokens ?? 0) + (usage.outputTokens ?? 0);
      this.stats.successes++;
      this.stats.totalTokens += totalTokens;

      generateLogger.info(
        { model: this.config.model, totalTokens, durationMs: Date.now() - startTime },
        'Generation completed'
      );

      return text;
    } catch (error) {
      this.stats.errors++;
      generateLogger.warn({ err: error, model: this.config.model }, 'Generation failed');
      throw error;
    }
  }

  asGenerator(): Generator {
    return (prompt, { signal }) => this.generate(prompt, signal);
  }

  getStats(): GenerateServiceStats {
    return {
      ...this.stats,
      successRate:
        this.stats.requests > 0 ? Math.round((this.stats.successes / this.stats.requests) * 100) : 0,
      provider: 'google (ai-sdk)',
      model: this.config.model,
    };
  }
}
