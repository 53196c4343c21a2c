import { describe, expect, it } from 'vitest';
import {
  buildTemplateTable,
  FALLBACK_TEMPLATES,
  generalSuggestions,
  matchTemplate,
  suggestFollowUps,
} from './fallback-templates';

describe('matchTemplate', () => {
  it('returns the first matching category in table order', () => {
    expect(matchTemplate('What is the status of transformer TR001?')?.name).toBe('status');
    expect(matchTemplate('How much did repairs cost?')?.name).toBe('costs');
    expect(matchTemplate('Histórico de manutenção')?.name).toBe('maintenance');
  });

  it('returns null when nothing matches', () => {
    expect(matchTemplate('weather tomorrow')).toBeNull();
  });
});

describe('generalSuggestions', () => {
  it('draws examples round-robin across categories', () => {
    expect(generalSuggestions(6)).toEqual([
      'What is the status of the transformers?',
      'List preventive maintenance done last month',
      'Which transformers failed most often?',
      'What was the total maintenance cost this year?',
      'How many generators are installed?',
      'Which equipment is out of operation?',
    ]);
  });

  it('never exceeds the limit', () => {
    expect(generalSuggestions(2)).toHaveLength(2);
  });
});

describe('suggestFollowUps', () => {
  it('prefers examples of matching categories and skips the question itself', () => {
    expect(suggestFollowUps('What is the status of the transformers?')).toEqual([
      'Which equipment is out of operation?',
      'Show the condition of the main breakers',
      'How many generators are installed?',
      'List breakers at the main substation',
      'Show details for the oldest transformers',
    ]);
  });

  it('falls back to general examples', () => {
    expect(suggestFollowUps('hello there', 3)).toEqual(generalSuggestions(3));
  });
});

describe('buildTemplateTable', () => {
  it('loads every category from the bundled table', () => {
    expect(FALLBACK_TEMPLATES.categories.map((category) => category.name)).toEqual([
      'status',
      'maintenance',
      'failures',
      'costs',
      'equipment',
    ]);
    expect(FALLBACK_TEMPLATES.predefined.has('TIMEOUT')).toBe(true);
  });

  it('rejects unknown trigger names', () => {
    expect(() =>
      buildTemplateTable({
        categories: [{ name: 'x', pattern: 'x', message: 'x', examples: ['x'] }],
        predefined: { NOT_A_TRIGGER: { message: 'x', suggestions: [] } },
        defaultPredefined: { message: 'x', suggestions: [] },
        helpMessages: {},
        defaultHelpMessage: 'x',
      })
    ).toThrow('Unknown fallback trigger "NOT_A_TRIGGER" in predefined');
  });
});
