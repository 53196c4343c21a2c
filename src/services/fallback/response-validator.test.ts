import { describe, expect, it } from 'vitest';
import { hasDomainKeyword, isOffTopicQuery, validateResponse } from './response-validator';

const GOOD_ANSWER = 'Transformer TR-001 had two preventive maintenance visits in 2024.';

describe('validateResponse', () => {
  it('accepts a grounded domain answer', () => {
    expect(validateResponse(GOOD_ANSWER, 'maintenance of TR-001')).toEqual({
      isValid: true,
      check: 'VALID',
    });
  });

  it('rejects empty and very short responses', () => {
    expect(validateResponse('', 'maintenance of TR-001')).toEqual({
      isValid: false,
      check: 'EMPTY',
      trigger: 'EMPTY_RESPONSE',
    });
    expect(validateResponse(null, 'maintenance of TR-001').isValid).toBe(false);
    expect(validateResponse('   Too short.   ', 'maintenance of TR-001')).toMatchObject({
      check: 'EMPTY',
    });
  });

  it('rejects hedging and apology patterns', () => {
    expect(
      validateResponse('I don’t know anything about that transformer.', 'transformer status')
    ).toEqual({ isValid: false, check: 'INADEQUATE_PATTERN', trigger: 'INVALID_RESPONSE' });
    expect(
      validateResponse('Não sei responder sobre esse transformador.', 'status do trafo')
    ).toMatchObject({ check: 'INADEQUATE_PATTERN' });
  });

  it('flags off-topic questions', () => {
    expect(validateResponse(GOOD_ANSWER, 'What is the weather today?')).toEqual({
      isValid: false,
      check: 'OUT_OF_DOMAIN_QUERY',
      trigger: 'OUT_OF_DOMAIN',
    });
  });

  it('flags answers without any domain signal', () => {
    expect(
      validateResponse('The answer to your question is forty two, enjoy.', 'hello there')
    ).toEqual({ isValid: false, check: 'MISSING_DOMAIN_SIGNAL', trigger: 'OUT_OF_DOMAIN' });
  });

  it('accepts help-style answers without domain keywords', () => {
    expect(
      validateResponse('For example, ask me something more specific next time.', 'hello there')
    ).toEqual({ isValid: true, check: 'VALID' });
  });

  it('reports the first failing check', () => {
    expect(validateResponse('', 'football scores').check).toBe('EMPTY');
    expect(
      validateResponse('Sorry, sorry, sorry, I really cannot say.', 'football scores').check
    ).toBe('INADEQUATE_PATTERN');
  });
});

describe('isOffTopicQuery', () => {
  it('detects off-topic markers in either language', () => {
    expect(isOffTopicQuery('Qual o resultado do futebol?')).toBe(true);
    expect(isOffTopicQuery('Any good recipes for dinner?')).toBe(true);
    expect(isOffTopicQuery('Generator costs in March')).toBe(false);
  });
});

describe('hasDomainKeyword', () => {
  it('matches keywords after synonym folding', () => {
    expect(hasDomainKeyword('Quais disjuntores falharam?')).toBe(true);
    expect(hasDomainKeyword('hello there')).toBe(false);
  });
});
