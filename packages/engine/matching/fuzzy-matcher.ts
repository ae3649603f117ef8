// Fuzzy industry matching: industry names found in the question,
// plus catalog keywords whose similarity to the whole question clears a threshold

import type { KeywordCatalog } from '../config/keyword-catalog.js';
import type { MatchCandidate } from '../types/catalog.js';
import { similarityRatio } from './similarity.js';

export const SIMILAR_INDUSTRY_CONFIDENCE = 0.9;
export const SIMILARITY_THRESHOLD = 0.6;

export class FuzzyIndustryMatcher {
  constructor(
    private readonly catalog: KeywordCatalog,
    private readonly threshold = SIMILARITY_THRESHOLD,
  ) {}

  findSimilar(query: string): MatchCandidate[] {
    const queryLower = query.toLowerCase();
    const matches: MatchCandidate[] = [];

    for (const { industry, relatedKeywords } of this.catalog.industryEntries()) {
      if (queryLower.includes(industry.toLowerCase())) {
        matches.push({
          keyword: industry,
          category: null,
          matchType: 'similar_industry',
          confidence: SIMILAR_INDUSTRY_CONFIDENCE,
          relatedKeywords,
        });
      }
    }

    for (const keyword of this.catalog.allKeywords()) {
      const ratio = similarityRatio(queryLower, keyword.toLowerCase());
      if (ratio > this.threshold) {
        matches.push({
          keyword,
          category: null,
          matchType: 'similarity_based',
          confidence: ratio,
          relatedKeywords: [keyword],
        });
      }
    }

    return matches;
  }
}
