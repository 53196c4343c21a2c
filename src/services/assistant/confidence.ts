import { foldText } from '../../lib/vocabulary/maintenance-vocabulary';
import type { MaintenanceRecord } from './answer-types';

const HEDGING_PATTERN = /\b(maybe|perhaps|possibly|not sure|unclear|talvez|possivelmente|nao tenho certeza)\b/;

/**
 * Default confidence when the caller supplies none: grounded answers with
 * supporting records and some substance score higher, hedging lowers it.
 * Without records the result never exceeds 0.2.
 */
export function estimateConfidence(records: readonly MaintenanceRecord[], text: string): number {
  let score = 0;

  if (records.length > 0) {
    score += 0.4;
    score += Math.min(0.3, records.length * 0.05);
  }

  const length = text.trim().length;
  if (length > 100) {
    score += 0.2;
  } else if (length > 50) {
    score += 0.1;
  }

  if (HEDGING_PATTERN.test(foldText(text))) {
    score -= 0.2;
  }

  return Math.round(Math.min(1, Math.max(0, score)) * 100) / 100;
}
