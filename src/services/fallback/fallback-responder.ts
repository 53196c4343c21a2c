/**
 * Fallback Responder
 *
 * Replaces failed or untrustworthy generations with a templated answer.
 * Strategy selection is a fixed decision table:
 *
 * 1. OUT_OF_DOMAIN                          -> HELP_SUGGESTIONS
 * 2. domain keyword + matching category     -> TEMPLATE_BASED
 * 3. LLM_ERROR | TIMEOUT                    -> PREDEFINED
 * 4. anything else                          -> HELP_SUGGESTIONS
 *
 * `generate` never throws: any internal error yields the emergency
 * (ESCALATION) response.
 *
 * @version 1.0.0
 */

import { logger } from '../../lib/logger';
import {
  FALLBACK_TEMPLATES,
  generalSuggestions,
  matchTemplate,
  type FallbackTemplateTable,
  type TemplateCategory,
} from './fallback-templates';
import {
  FALLBACK_TRIGGERS,
  type FallbackContext,
  type FallbackFeedback,
  type FallbackHealth,
  type FallbackMetrics,
  type FallbackResponse,
  type FallbackStrategy,
  type FallbackTrigger,
} from './fallback-types';
import { hasDomainKeyword } from './response-validator';

const fallbackLogger = logger.child({ component: 'fallback-responder' });

// ============================================================================
// 1. Constants
// ============================================================================

const MAX_SUGGESTIONS = 6;
const EMERGENCY_CONFIDENCE = 0.1;
const EQUIPMENT_ID_PATTERN = /\b[A-Z]{2}\d{3}\b/g;

const TRIGGER_CONFIDENCE: Record<FallbackTrigger, number> = {
  LLM_ERROR: 0.3,
  EMPTY_RESPONSE: 0.4,
  LOW_CONFIDENCE: 0.35,
  UNSUPPORTED_QUERY: 0.4,
  TIMEOUT: 0.35,
  API_QUOTA_EXCEEDED: 0.4,
  INVALID_RESPONSE: 0.3,
  OUT_OF_DOMAIN: 0.5,
};

const EMERGENCY_MESSAGE =
  'Something went wrong while preparing an answer. Please try again later or contact the maintenance team.';
const EMERGENCY_SUGGESTIONS = ['Try again later', 'Contact the maintenance team'];

export type StrategyDecision =
  | { strategy: 'TEMPLATE_BASED'; category: TemplateCategory }
  | { strategy: 'PREDEFINED' }
  | { strategy: 'HELP_SUGGESTIONS' };

// ============================================================================
// 2. Helpers
// ============================================================================

export function extractEquipmentIds(query: string): string[] {
  return Array.from(new Set(query.toUpperCase().match(EQUIPMENT_ID_PATTERN) ?? []));
}

function limitSuggestions(suggestions: readonly string[]): string[] {
  return Array.from(new Set(suggestions)).slice(0, MAX_SUGGESTIONS);
}

function zeroTriggerCounts(): Record<FallbackTrigger, number> {
  return {
    LLM_ERROR: 0,
    EMPTY_RESPONSE: 0,
    LOW_CONFIDENCE: 0,
    UNSUPPORTED_QUERY: 0,
    TIMEOUT: 0,
    API_QUOTA_EXCEEDED: 0,
    INVALID_RESPONSE: 0,
    OUT_OF_DOMAIN: 0,
  };
}

function zeroStrategyCounts(): Record<FallbackStrategy, number> {
  return {
    PREDEFINED: 0,
    TEMPLATE_BASED: 0,
    HELP_SUGGESTIONS: 0,
    ESCALATION: 0,
  };
}

export function createEmergencyFallback(trigger: FallbackTrigger): FallbackResponse {
  return {
    message: EMERGENCY_MESSAGE,
    suggestions: [...EMERGENCY_SUGGESTIONS],
    strategyUsed: 'ESCALATION',
    trigger,
    confidence: EMERGENCY_CONFIDENCE,
    actionable: false,
    metadata: {
      equipmentIds: [],
      timestamp: new Date().toISOString(),
    },
  };
}

// ============================================================================
// 3. Responder
// ============================================================================

export class FallbackResponder {
  private readonly templates: FallbackTemplateTable;
  private totalFallbacks = 0;
  private emergencyCount = 0;
  private byTrigger: Record<FallbackTrigger, number> = zeroTriggerCounts();
  private byStrategy: Record<FallbackStrategy, number> = zeroStrategyCounts();
  private feedbackCount = 0;
  private ratingSum = 0;

  constructor(templates: FallbackTemplateTable = FALLBACK_TEMPLATES) {
    this.templates = templates;
  }

  selectStrategy(trigger: FallbackTrigger, query: string): StrategyDecision {
    if (trigger === 'OUT_OF_DOMAIN') {
      return { strategy: 'HELP_SUGGESTIONS' };
    }

    if (hasDomainKeyword(query)) {
      const category = matchTemplate(query, this.templates);
      if (category) {
        return { strategy: 'TEMPLATE_BASED', category };
      }
    }

    if (trigger === 'LLM_ERROR' || trigger === 'TIMEOUT') {
      return { strategy: 'PREDEFINED' };
    }

    return { strategy: 'HELP_SUGGESTIONS' };
  }

  generate(trigger: FallbackTrigger, query: string, context: FallbackContext = {}): FallbackResponse {
    try {
      const decision = this.selectStrategy(trigger, query);
      const response = this.build(decision, trigger, query);

      this.totalFallbacks++;
      this.byTrigger[trigger]++;
      this.byStrategy[response.strategyUsed]++;

      fallbackLogger.info(
        {
          trigger,
          strategy: response.strategyUsed,
          templateCategory: response.templateCategory,
          contextKeys: Object.keys(context),
        },
        'Fallback generated'
      );

      return response;
    } catch (error) {
      this.totalFallbacks++;
      this.emergencyCount++;
      this.byTrigger[trigger]++;
      this.byStrategy.ESCALATION++;

      fallbackLogger.error({ err: error, trigger }, 'Fallback generation failed, using emergency response');
      return createEmergencyFallback(trigger);
    }
  }

  private build(decision: StrategyDecision, trigger: FallbackTrigger, query: string): FallbackResponse {
    const equipmentIds = extractEquipmentIds(query);
    let message: string;
    let suggestions: readonly string[];
    let templateCategory: string | undefined;

    switch (decision.strategy) {
      case 'TEMPLATE_BASED':
        message = decision.category.message;
        suggestions = decision.category.examples;
        templateCategory = decision.category.name;
        break;
      case 'PREDEFINED': {
        const predefined = this.templates.predefined.get(trigger) ?? this.templates.defaultPredefined;
        message = predefined.message;
        suggestions = predefined.suggestions;
        break;
      }
      case 'HELP_SUGGESTIONS':
        message = this.templates.helpMessages.get(trigger) ?? this.templates.defaultHelpMessage;
        suggestions = generalSuggestions(MAX_SUGGESTIONS, this.templates);
        break;
      default: {
        const exhaustive: never = decision;
        throw new Error(`Unhandled fallback strategy: ${JSON.stringify(exhaustive)}`);
      }
    }

    if (equipmentIds.length > 0) {
      message = `${message}\n\nEquipment mentioned: ${equipmentIds.join(', ')}`;
    }

    return {
      message,
      suggestions: limitSuggestions(suggestions),
      strategyUsed: decision.strategy,
      trigger,
      confidence: TRIGGER_CONFIDENCE[trigger],
      actionable: true,
      ...(templateCategory !== undefined && { templateCategory }),
      metadata: {
        equipmentIds,
        timestamp: new Date().toISOString(),
      },
    };
  }

  // --------------------------------------------------------------------------
  // Feedback & metrics
  // --------------------------------------------------------------------------

  recordFeedback(feedback: FallbackFeedback): void {
    this.feedbackCount++;
    this.ratingSum += feedback.rating;
    fallbackLogger.info({ responseId: feedback.responseId, rating: feedback.rating }, 'Fallback feedback recorded');
  }

  getMetrics(): FallbackMetrics {
    return {
      totalFallbacks: this.totalFallbacks,
      emergencyCount: this.emergencyCount,
      byTrigger: { ...this.byTrigger },
      byStrategy: { ...this.byStrategy },
      feedbackCount: this.feedbackCount,
      averageSatisfaction: this.averageSatisfaction(),
    };
  }

  getHealth(): FallbackHealth {
    const emergencyRate =
      this.totalFallbacks > 0 ? Math.round((this.emergencyCount / this.totalFallbacks) * 1000) / 1000 : 0;
    const averageSatisfaction = this.averageSatisfaction();

    let mostCommonTrigger: FallbackTrigger | null = null;
    for (const trigger of FALLBACK_TRIGGERS) {
      const count = this.byTrigger[trigger];
      if (count > 0 && (mostCommonTrigger === null || count > this.byTrigger[mostCommonTrigger])) {
        mostCommonTrigger = trigger;
      }
    }

    const recommendations: string[] = [];
    if (emergencyRate > 0.05) {
      recommendations.push('Emergency responses above 5% - check fallback template data');
    }
    if (mostCommonTrigger === 'TIMEOUT') {
      recommendations.push('Timeouts dominate - consider a longer generation timeout or narrower prompts');
    }
    if (mostCommonTrigger === 'API_QUOTA_EXCEEDED') {
      recommendations.push('Quota errors dominate - review provider limits');
    }
    if (mostCommonTrigger === 'OUT_OF_DOMAIN') {
      recommendations.push('Many off-topic questions - review onboarding hints');
    }
    if (averageSatisfaction !== null && averageSatisfaction < 3) {
      recommendations.push('Low satisfaction with fallback answers - review template wording');
    }

    let status: FallbackHealth['status'] = 'healthy';
    if (emergencyRate > 0.2 || (averageSatisfaction !== null && averageSatisfaction < 2)) {
      status = 'critical';
    } else if (recommendations.length > 0) {
      status = 'warning';
    }

    return {
      status,
      totalFallbacks: this.totalFallbacks,
      emergencyRate,
      mostCommonTrigger,
      averageSatisfaction,
      recommendations,
    };
  }

  reset(): void {
    this.totalFallbacks = 0;
    this.emergencyCount = 0;
    this.byTrigger = zeroTriggerCounts();
    this.byStrategy = zeroStrategyCounts();
    this.feedbackCount = 0;
    this.ratingSum = 0;
  }

  private averageSatisfaction(): number | null {
    if (this.feedbackCount === 0) return null;
    return Math.round((this.ratingSum / this.feedbackCount) * 100) / 100;
  }
}
