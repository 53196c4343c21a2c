/**
 * Response Validator
 *
 * Ordered adequacy checks on a generated answer. The first failing check
 * decides the fallback trigger.
 *
 * @version 1.0.0
 */

import { normalizeQuery, tokenizeNormalized } from '../../lib/cache/query-normalizer';
import {
  foldText,
  MAINTENANCE_VOCABULARY,
  type MaintenanceVocabulary,
} from '../../lib/vocabulary/maintenance-vocabulary';
import type { FallbackTrigger } from './fallback-types';

export type ValidationCheck =
  | 'VALID'
  | 'EMPTY'
  | 'INADEQUATE_PATTERN'
  | 'OUT_OF_DOMAIN_QUERY'
  | 'MISSING_DOMAIN_SIGNAL';

export type ValidationResult =
  | { isValid: true; check: 'VALID' }
  | { isValid: false; check: Exclude<ValidationCheck, 'VALID'>; trigger: FallbackTrigger };

export interface ValidationOptions {
  minChars?: number;
  vocabulary?: MaintenanceVocabulary;
}

export const MIN_RESPONSE_CHARS = 20;

export function isOffTopicQuery(
  query: string,
  vocabulary: MaintenanceVocabulary = MAINTENANCE_VOCABULARY
): boolean {
  const folded = foldText(query);
  return vocabulary.offTopicPatterns.some((pattern) => pattern.test(folded));
}

export function hasDomainKeyword(
  text: string,
  vocabulary: MaintenanceVocabulary = MAINTENANCE_VOCABULARY
): boolean {
  for (const token of tokenizeNormalized(normalizeQuery(text, vocabulary))) {
    if (vocabulary.domainKeywords.has(token)) return true;
  }
  return false;
}

export function validateResponse(
  response: string | null | undefined,
  query: string,
  options: ValidationOptions = {}
): ValidationResult {
  const { minChars = MIN_RESPONSE_CHARS, vocabulary = MAINTENANCE_VOCABULARY } = options;
  const trimmed = (response ?? '').trim();

  if (trimmed.length < minChars) {
    return { isValid: false, check: 'EMPTY', trigger: 'EMPTY_RESPONSE' };
  }

  const folded = foldText(trimmed);
  if (vocabulary.inadequatePatterns.some((pattern) => pattern.test(folded))) {
    return { isValid: false, check: 'INADEQUATE_PATTERN', trigger: 'INVALID_RESPONSE' };
  }

  if (isOffTopicQuery(query, vocabulary)) {
    return { isValid: false, check: 'OUT_OF_DOMAIN_QUERY', trigger: 'OUT_OF_DOMAIN' };
  }

  const offersHelp = vocabulary.helpIndicators.some((pattern) => pattern.test(folded));
  if (!offersHelp && !hasDomainKeyword(trimmed, vocabulary)) {
    return { isValid: false, check: 'MISSING_DOMAIN_SIGNAL', trigger: 'OUT_OF_DOMAIN' };
  }

  return { isValid: true, check: 'VALID' };
}
