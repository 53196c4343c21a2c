import { normalizeQuery, tokenizeNormalized } from './query-normalizer';

function collapseRaw(text: string | null | undefined): string {
  return (text ?? '').toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Jaccard overlap of two already-normalized queries.
 * Used directly by the cache scan, where entries keep their normalized form.
 */
export function compareNormalizedQueries(left: string, right: string): number {
  if (!left || !right) return 0;
  if (left === right) return 1;

  const leftTokens = tokenizeNormalized(left);
  const rightTokens = tokenizeNormalized(right);
  if (leftTokens.size === 0 || rightTokens.size === 0) return 0;

  let shared = 0;
  for (const token of leftTokens) {
    if (rightTokens.has(token)) shared++;
  }
  const union = leftTokens.size + rightTokens.size - shared;

  return shared / union;
}

/**
 * Similarity in [0, 1] between two free-text queries.
 * Symmetric, and 1 for any non-empty query compared with itself.
 */
export function calculateQuerySimilarity(
  queryA: string | null | undefined,
  queryB: string | null | undefined
): number {
  const normalizedA = normalizeQuery(queryA);
  const normalizedB = normalizeQuery(queryB);

  if (!normalizedA && !normalizedB) {
    // punctuation or stop words only: nothing survives normalization
    const rawA = collapseRaw(queryA);
    return rawA.length > 0 && rawA === collapseRaw(queryB) ? 1 : 0;
  }

  return compareNormalizedQueries(normalizedA, normalizedB);
}
