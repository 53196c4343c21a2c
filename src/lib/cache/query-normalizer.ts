import {
  foldText,
  MAINTENANCE_VOCABULARY,
  type MaintenanceVocabulary,
} from '../vocabulary/maintenance-vocabulary';

export const DATE_PLACEHOLDER = 'DATA';
export const EQUIPMENT_ID_PLACEHOLDER = 'ID_EQUIPAMENTO';

const DATE_PATTERNS = [
  /\b\d{4}-\d{2}-\d{2}\b/g,
  /\b\d{1,2}[/-]\d{1,2}[/-]\d{4}\b/g,
];

function canonicalizeCacheToken(
  token: string,
  vocabulary: MaintenanceVocabulary
): string {
  if (token === DATE_PLACEHOLDER) return token;

  const trimmed = token.replace(/^-+|-+$/g, '');
  if (!trimmed) return '';

  // TR-001, ge12, 4500
  if (/\d/.test(trimmed)) return EQUIPMENT_ID_PLACEHOLDER;

  return vocabulary.synonyms.get(trimmed) ?? trimmed;
}

/**
 * Canonical form of a free-text query for cache keys and similarity.
 *
 * Lowercased and accent-free, dates and equipment ids generalized,
 * synonyms folded, stop words dropped, tokens deduplicated and sorted so
 * that word order does not matter. A query made only of stop words
 * normalizes to an empty string.
 */
export function normalizeQuery(
  query: string | null | undefined,
  vocabulary: MaintenanceVocabulary = MAINTENANCE_VOCABULARY
): string {
  if (!query) return '';

  let folded = foldText(query).trim();
  for (const pattern of DATE_PATTERNS) {
    folded = folded.replace(pattern, ` ${DATE_PLACEHOLDER} `);
  }

  const normalized = folded
    .replace(/[^\p{L}\p{N}\s-]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (!normalized) {
    return '';
  }

  const canonicalTokens = normalized
    .split(' ')
    .map((token) => canonicalizeCacheToken(token, vocabulary))
    .filter((token) => token.length > 0 && !vocabulary.stopWords.has(token));

  return Array.from(new Set(canonicalTokens)).sort().join(' ');
}

export function tokenizeNormalized(normalized: string): Set<string> {
  return new Set(normalized.split(' ').filter((token) => token.length > 0));
}
