import { describe, it, expect } from 'vitest';
import { KeywordCatalog } from '../config/keyword-catalog.js';
import { FuzzyIndustryMatcher, SIMILAR_INDUSTRY_CONFIDENCE } from '../matching/fuzzy-matcher.js';
import { similarityRatio } from '../matching/similarity.js';

describe('similarityRatio', () => {
  it('is 1 for identical strings, including two empty ones', () => {
    expect(similarityRatio('abc', 'abc')).toBe(1);
    expect(similarityRatio('', '')).toBe(1);
  });

  it('is 0 against an empty string', () => {
    expect(similarityRatio('abc', '')).toBe(0);
  });

  it('normalizes the edit distance by the longer string', () => {
    expect(similarityRatio('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7, 10);
  });

  it('is symmetric', () => {
    expect(similarityRatio('게임개발', '게임')).toBe(similarityRatio('게임', '게임개발'));
  });
});

describe('FuzzyIndustryMatcher', () => {
  it('finds industries named in the question, then similar keywords', () => {
    const matcher = new FuzzyIndustryMatcher(
      KeywordCatalog.fromDefinitions(
        { all_keywords: ['게임개발', '음원'] },
        { 게임: ['게임', '모바일게임'] },
      ),
    );

    expect(matcher.findSimilar('게임개발')).toEqual([
      {
        keyword: '게임',
        category: null,
        matchType: 'similar_industry',
        confidence: SIMILAR_INDUSTRY_CONFIDENCE,
        relatedKeywords: ['게임', '모바일게임'],
      },
      {
        keyword: '게임개발',
        category: null,
        matchType: 'similarity_based',
        confidence: 1,
        relatedKeywords: ['게임개발'],
      },
    ]);
  });

  it('keeps only ratios strictly above the threshold', () => {
    const matcher = new FuzzyIndustryMatcher(
      KeywordCatalog.fromDefinitions({ all_keywords: ['abcxy', 'abcdx'] }),
    );
    const matches = matcher.findSimilar('ABCDE');

    expect(matches.map(m => m.keyword)).toEqual(['abcdx']);
    expect(matches[0].confidence).toBeCloseTo(0.8, 10);
  });

  it('never emits a similarity match at or below 0.6 over the bundled catalog', () => {
    const matcher = new FuzzyIndustryMatcher(KeywordCatalog.load());
    for (const query of ['클라우드', '게임 유사기업', '반도체 장비', '보안솔루션', 'SaaS']) {
      for (const m of matcher.findSimilar(query)) {
        if (m.matchType === 'similarity_based') expect(m.confidence).toBeGreaterThan(0.6);
      }
    }
  });

  it('returns nothing for an empty catalog', () => {
    expect(new FuzzyIndustryMatcher(KeywordCatalog.empty()).findSimilar('게임')).toEqual([]);
  });
});
