/**
 * Fallback Template Table
 *
 * Static rule table (`src/data/fallback-templates.json`) validated at load.
 * Categories are matched in file order; the first match wins.
 *
 * @version 1.0.0
 */

import { z } from 'zod';
import rawTemplates from '../../data/fallback-templates.json';
import { normalizeQuery } from '../../lib/cache/query-normalizer';
import { foldText } from '../../lib/vocabulary/maintenance-vocabulary';
import { FALLBACK_TRIGGERS, type FallbackTrigger } from './fallback-types';

// ============================================================================
// 1. Schema
// ============================================================================

const predefinedSchema = z.object({
  message: z.string().min(1),
  suggestions: z.array(z.string().min(1)),
});

const templateFileSchema = z.object({
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        pattern: z.string().min(1),
        message: z.string().min(1),
        examples: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
  predefined: z.record(z.string(), predefinedSchema),
  defaultPredefined: predefinedSchema,
  helpMessages: z.record(z.string(), z.string().min(1)),
  defaultHelpMessage: z.string().min(1),
});

export interface TemplateCategory {
  name: string;
  pattern: RegExp;
  message: string;
  examples: readonly string[];
}

export interface PredefinedResponse {
  message: string;
  suggestions: readonly string[];
}

export interface FallbackTemplateTable {
  categories: readonly TemplateCategory[];
  predefined: ReadonlyMap<FallbackTrigger, PredefinedResponse>;
  defaultPredefined: PredefinedResponse;
  helpMessages: ReadonlyMap<FallbackTrigger, string>;
  defaultHelpMessage: string;
}

// ============================================================================
// 2. Loader
// ============================================================================

export function isFallbackTrigger(value: string): value is FallbackTrigger {
  return FALLBACK_TRIGGERS.some((trigger) => trigger === value);
}

function toTriggerMap<V>(record: Record<string, V>, section: string): Map<FallbackTrigger, V> {
  const map = new Map<FallbackTrigger, V>();
  for (const [key, value] of Object.entries(record)) {
    if (!isFallbackTrigger(key)) {
      throw new Error(`Unknown fallback trigger "${key}" in ${section}`);
    }
    map.set(key, value);
  }
  return map;
}

export function buildTemplateTable(raw: unknown): FallbackTemplateTable {
  const parsed = templateFileSchema.parse(raw);

  return {
    categories: parsed.categories.map((category) => ({
      name: category.name,
      pattern: new RegExp(category.pattern, 'u'),
      message: category.message,
      examples: category.examples,
    })),
    predefined: toTriggerMap(parsed.predefined, 'predefined'),
    defaultPredefined: parsed.defaultPredefined,
    helpMessages: toTriggerMap(parsed.helpMessages, 'helpMessages'),
    defaultHelpMessage: parsed.defaultHelpMessage,
  };
}

export const FALLBACK_TEMPLATES: FallbackTemplateTable = buildTemplateTable(rawTemplates);

// ============================================================================
// 3. Matching & suggestions
// ============================================================================

function matchText(query: string): string {
  return `${foldText(query)} ${normalizeQuery(query)}`;
}

export function matchTemplate(
  query: string,
  table: FallbackTemplateTable = FALLBACK_TEMPLATES
): TemplateCategory | null {
  const text = matchText(query);
  return table.categories.find((category) => category.pattern.test(text)) ?? null;
}

/**
 * Examples drawn round-robin across categories, deduplicated.
 */
export function generalSuggestions(
  limit = 6,
  table: FallbackTemplateTable = FALLBACK_TEMPLATES
): string[] {
  const suggestions: string[] = [];
  const seen = new Set<string>();
  const longest = Math.max(...table.categories.map((category) => category.examples.length));

  for (let round = 0; round < longest && suggestions.length < limit; round++) {
    for (const category of table.categories) {
      const example = category.examples[round];
      if (example === undefined || seen.has(example)) continue;
      seen.add(example);
      suggestions.push(example);
      if (suggestions.length >= limit) break;
    }
  }

  return suggestions;
}

/**
 * Follow-up questions for a successful answer: examples of every category
 * the query matches, topped up with general examples.
 */
export function suggestFollowUps(
  query: string,
  limit = 5,
  table: FallbackTemplateTable = FALLBACK_TEMPLATES
): string[] {
  const text = matchText(query);
  const asked = foldText(query).trim();
  const candidates = [
    ...table.categories
      .filter((category) => category.pattern.test(text))
      .flatMap((category) => category.examples),
    ...generalSuggestions(limit, table),
  ];

  const suggestions: string[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const key = foldText(candidate).trim();
    if (key === asked || seen.has(key)) continue;
    seen.add(key);
    suggestions.push(candidate);
    if (suggestions.length >= limit) break;
  }

  return suggestions;
}
