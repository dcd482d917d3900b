/**
 * Similarity Scoring Tests
 */

import {
  KeywordMatcher,
  KEYWORD_CONFIDENCE_DISCOUNT,
  KEYWORD_REASONING,
  clamp01,
  cosineSimilarity,
  overlapScore,
  rankByScore,
  roundConfidence,
  tokenize,
  type CorpusEntry,
} from '@tradeform/shared';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
  });

  it('scores a zero vector as 0', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
  });

  it('rejects vectors of different dimensions', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Embedding dimension mismatch: 2 vs 3');
  });
});

describe('clamp01', () => {
  it('clamps into [0, 1] and maps NaN to 0', () => {
    expect(clamp01(-0.3)).toBe(0);
    expect(clamp01(0.42)).toBe(0.42);
    expect(clamp01(1.7)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe('tokenize', () => {
  it('lowercases and splits on anything that is not a letter or digit', () => {
    expect(Array.from(tokenize('Wireless, Bluetooth-Headphones (2 pcs)'))).toEqual([
      'wireless',
      'bluetooth',
      'headphones',
      '2',
      'pcs',
    ]);
  });

  it('keeps non-ASCII letters', () => {
    expect(Array.from(tokenize('Käse für Müller'))).toEqual(['käse', 'für', 'müller']);
  });

  it('deduplicates tokens', () => {
    expect(tokenize('tea TEA tea').size).toBe(1);
  });
});

describe('overlapScore', () => {
  it('is the share of query tokens found in the document', () => {
    expect(overlapScore(tokenize('cotton shirts blue'), tokenize('T-shirts of cotton'))).toBeCloseTo(2 / 3, 10);
  });

  it('is 0 for an empty query', () => {
    expect(overlapScore(new Set(), tokenize('anything'))).toBe(0);
  });
});

describe('rankByScore', () => {
  it('orders by descending score and keeps input order for ties', () => {
    const ranked = rankByScore(
      [
        { item: 'a', score: 0.2 },
        { item: 'b', score: 0.9 },
        { item: 'c', score: 0.2 },
        { item: 'd', score: 0.5 },
      ],
      10
    );
    expect(ranked.map((r) => r.item)).toEqual(['b', 'd', 'a', 'c']);
  });

  it('returns at most limit entries', () => {
    const scored = [1, 2, 3, 4].map((n) => ({ item: n, score: n }));
    expect(rankByScore(scored, 2).map((r) => r.item)).toEqual([4, 3]);
    expect(rankByScore(scored, 0)).toEqual([]);
  });
});

describe('KeywordMatcher', () => {
  const corpus: CorpusEntry[] = [
    { code: '6109.10', description: 'T-shirts, singlets and other vests, of cotton, knitted' },
    { code: '8471.30', description: 'Portable automatic data processing machines (laptops)' },
    { code: '6203.42', description: "Men's trousers of cotton" },
  ];
  const matcher = new KeywordMatcher(corpus);

  it('ranks by token overlap scaled by the keyword discount', () => {
    const results = matcher.match('cotton t-shirts', 3);

    // query tokens: cotton, t, shirts
    expect(results.map((r) => r.code)).toEqual(['6109.10', '6203.42', '8471.30']);
    expect(results.map((r) => r.confidence)).toEqual([0.5, roundConfidence((1 / 3) * 0.5), 0]);
    expect(results[0].reasoning).toBe(KEYWORD_REASONING);
  });

  it('never reports a confidence above the discount', () => {
    const results = matcher.match('portable automatic data processing machines laptops', 3);
    expect(results[0].code).toBe('8471.30');
    expect(results[0].confidence).toBe(KEYWORD_CONFIDENCE_DISCOUNT);
    for (const result of results) {
      expect(result.confidence).toBeLessThanOrEqual(0.5);
    }
  });

  it('still fills the requested count with zero-score entries in corpus order', () => {
    const results = matcher.match('frozen fish', 2);
    expect(results.map((r) => [r.code, r.confidence])).toEqual([
      ['6109.10', 0],
      ['8471.30', 0],
    ]);
  });
});

describe('roundConfidence', () => {
  it('rounds to four decimals', () => {
    expect(roundConfidence(1 / 6)).toBe(0.1667);
    expect(roundConfidence(0.123456)).toBe(0.1235);
  });
});
