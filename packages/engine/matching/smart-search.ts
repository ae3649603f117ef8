// Smart search: exact keyword matches merged with fuzzy industry matches

import type { KeywordCatalog } from '../config/keyword-catalog.js';
import type { MatchCandidate } from '../types/catalog.js';
import { ExactKeywordMatcher } from './exact-matcher.js';
import { FuzzyIndustryMatcher } from './fuzzy-matcher.js';

export class SmartSearchResolver {
  private readonly exact: ExactKeywordMatcher;
  private readonly fuzzy: FuzzyIndustryMatcher;

  constructor(catalog: KeywordCatalog) {
    this.exact = new ExactKeywordMatcher(catalog);
    this.fuzzy = new FuzzyIndustryMatcher(catalog);
  }

  /**
   * Exact matches followed by fuzzy matches, stably sorted by confidence.
   * Exact matches all carry confidence 1.0, so they keep their priority order
   * and stay ahead of every fuzzy match.
   */
  resolve(query: string): MatchCandidate[] {
    const all = [...this.exact.findExactMatches(query), ...this.fuzzy.findSimilar(query)];
    return all.sort((a, b) => b.confidence - a.confidence);
  }

  /** Best candidate, or null when nothing matched */
  bestMatch(query: string): MatchCandidate | null {
    return this.resolve(query)[0] ?? null;
  }

  bestKeyword(query: string): string | null {
    return this.bestMatch(query)?.keyword ?? null;
  }
}
