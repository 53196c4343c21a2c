/**
 * Maintenance Domain Vocabulary
 *
 * Single source for the word lists shared by the query normalizer, the
 * response validator, the fallback template matcher and the cache tagger.
 * The raw lists live in `src/data/maintenance-vocabulary.json`.
 *
 * @version 1.0.0
 */

import { z } from 'zod';
import rawVocabulary from '../../data/maintenance-vocabulary.json';

// ============================================================================
// 1. Types
// ============================================================================

const vocabularySchema = z.object({
  stopWords: z.array(z.string().min(1)),
  synonyms: z.record(z.string().min(1), z.array(z.string().min(1))),
  domainKeywords: z.array(z.string().min(1)),
  offTopicPatterns: z.array(z.string().min(1)),
  inadequatePatterns: z.array(z.string().min(1)),
  helpIndicators: z.array(z.string().min(1)),
  tagTerms: z.array(z.string().min(1)),
});

export type RawVocabulary = z.infer<typeof vocabularySchema>;

export interface MaintenanceVocabulary {
  stopWords: ReadonlySet<string>;
  /** variant -> canonical term (canonical terms map to themselves) */
  synonyms: ReadonlyMap<string, string>;
  domainKeywords: ReadonlySet<string>;
  offTopicPatterns: readonly RegExp[];
  inadequatePatterns: readonly RegExp[];
  helpIndicators: readonly RegExp[];
  tagTerms: readonly string[];
}

// ============================================================================
// 2. Text folding
// ============================================================================

/**
 * Lowercase, strip diacritics and straighten typographic quotes.
 * `"Manutenção"` -> `"manutencao"`.
 */
export function foldText(text: string): string {
  return text
    .normalize('NFD')
    .replace(/\p{M}+/gu, '')
    .replace(/[‘’]/g, "'")
    .toLowerCase();
}

// ============================================================================
// 3. Builder
// ============================================================================

function compilePatterns(sources: string[]): RegExp[] {
  return sources.map((source) => new RegExp(source, 'u'));
}

export function buildVocabulary(raw: unknown): MaintenanceVocabulary {
  const parsed = vocabularySchema.parse(raw);

  const synonyms = new Map<string, string>();
  for (const [canonical, variants] of Object.entries(parsed.synonyms)) {
    const canonicalTerm = foldText(canonical);
    synonyms.set(canonicalTerm, canonicalTerm);
    for (const variant of variants) {
      synonyms.set(foldText(variant), canonicalTerm);
    }
  }

  return {
    stopWords: new Set(parsed.stopWords.map(foldText)),
    synonyms,
    domainKeywords: new Set(parsed.domainKeywords.map(foldText)),
    offTopicPatterns: compilePatterns(parsed.offTopicPatterns),
    inadequatePatterns: compilePatterns(parsed.inadequatePatterns),
    helpIndicators: compilePatterns(parsed.helpIndicators),
    tagTerms: parsed.tagTerms.map(foldText),
  };
}

export const MAINTENANCE_VOCABULARY: MaintenanceVocabulary = buildVocabulary(rawVocabulary);
