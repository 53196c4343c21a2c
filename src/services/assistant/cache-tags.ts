import { normalizeQuery, tokenizeNormalized } from '../../lib/cache/query-normalizer';
import { MAINTENANCE_VOCABULARY } from '../../lib/vocabulary/maintenance-vocabulary';
import type { AnswerContext } from './answer-types';

const LARGE_DATASET_THRESHOLD = 10;

/**
 * Tags used for group invalidation: domain terms in the query,
 * `type_<queryType>`, and the data volume bucket.
 */
export function deriveCacheTags(query: string, recordCount: number, context: AnswerContext = {}): string[] {
  const tokens = tokenizeNormalized(normalizeQuery(query));
  const tags = MAINTENANCE_VOCABULARY.tagTerms.filter((term) => tokens.has(term));

  const queryType = context.queryType;
  if (typeof queryType === 'string' && queryType.length > 0) {
    tags.push(`type_${queryType}`);
  }

  if (recordCount > 0) {
    tags.push('with_data');
    if (recordCount > LARGE_DATASET_THRESHOLD) tags.push('large_dataset');
  } else {
    tags.push('no_data');
  }

  return tags;
}
