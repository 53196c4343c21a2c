export const FALLBACK_TRIGGERS = [
  'LLM_ERROR',
  'EMPTY_RESPONSE',
  'LOW_CONFIDENCE',
  'UNSUPPORTED_QUERY',
  'TIMEOUT',
  'API_QUOTA_EXCEEDED',
  'INVALID_RESPONSE',
  'OUT_OF_DOMAIN',
] as const;

export type FallbackTrigger = (typeof FALLBACK_TRIGGERS)[number];

export type FallbackStrategy = 'PREDEFINED' | 'TEMPLATE_BASED' | 'HELP_SUGGESTIONS' | 'ESCALATION';

export type FallbackContext = Readonly<Record<string, unknown>>;

export interface FallbackResponse {
  message: string;
  /** at most 6, deduplicated */
  suggestions: string[];
  strategyUsed: FallbackStrategy;
  trigger: FallbackTrigger;
  confidence: number;
  actionable: boolean;
  templateCategory?: string;
  metadata: {
    equipmentIds: string[];
    timestamp: string;
  };
}

export interface FallbackFeedback {
  responseId: string;
  /** 1-5 */
  rating: number;
  comments?: string;
}

export interface FallbackMetrics {
  totalFallbacks: number;
  emergencyCount: number;
  byTrigger: Record<FallbackTrigger, number>;
  byStrategy: Record<FallbackStrategy, number>;
  feedbackCount: number;
  averageSatisfaction: number | null;
}

export interface FallbackHealth {
  status: 'healthy' | 'warning' | 'critical';
  totalFallbacks: number;
  emergencyRate: number;
  mostCommonTrigger: FallbackTrigger | null;
  averageSatisfaction: number | null;
  recommendations: string[];
}
