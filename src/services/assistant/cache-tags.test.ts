import { describe, expect, it } from 'vitest';
import { deriveCacheTags } from './cache-tags';

describe('deriveCacheTags', () => {
  it('tags domain terms, query type and data volume', () => {
    expect(deriveCacheTags('Status of main transformers', 3, { queryType: 'status' })).toEqual([
      'transformer',
      'status',
      'type_status',
      'with_data',
    ]);
  });

  it('marks large datasets', () => {
    expect(deriveCacheTags('generator costs', 11)).toEqual(['generator', 'cost', 'with_data', 'large_dataset']);
  });

  it('marks answers without data', () => {
    expect(deriveCacheTags('hello there', 0)).toEqual(['no_data']);
  });
});
