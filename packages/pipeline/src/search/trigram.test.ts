import { describe, expect, test } from 'vitest';

import { trigramSimilarity, trigrams } from './trigram';

describe('trigrams', () => {
  test('pads every word', () => {
    expect([...trigrams('Cat')]).toEqual(['  c', ' ca', 'cat', 'at ']);
  });

  test('splits on anything but letters and digits', () => {
    expect(trigrams('a-b').size).toBe(4);
    expect([...trigrams('a-b')]).toEqual(['  a', ' a ', '  b', ' b ']);
  });

  test('is empty for text without words', () => {
    expect(trigrams('--- !!').size).toBe(0);
  });
});

describe('trigramSimilarity', () => {
  test('is 1 for equal words regardless of case', () => {
    expect(trigramSimilarity('River', 'river')).toBe(1);
  });

  test('divides shared trigrams by the union', () => {
    expect(trigramSimilarity('cat dog', 'cat')).toBe(0.5);
  });

  test('is 0 when nothing is shared or one side is empty', () => {
    expect(trigramSimilarity('cat', 'dog')).toBe(0);
    expect(trigramSimilarity('', 'dog')).toBe(0);
  });
});
