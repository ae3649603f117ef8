// Exact keyword matching with additive priority scoring
// Specific compound and technology terms outrank generic business jargon

import type { KeywordCatalog } from '../config/keyword-catalog.js';
import type { MatchCandidate } from '../types/catalog.js';

/** High-specificity technology / industry terms */
export const PRIORITY_KEYWORDS: readonly string[] = [
  'ai', '클라우드', '블록체인', 'iot', '바이오', '신재생에너지', '전기차', '반도체',
  'cloud', 'blockchain', 'bio', 'renewable energy', 'electric vehicle', 'semiconductor',
];

/** Vague words that would otherwise match almost any question */
export const GENERIC_KEYWORDS: readonly string[] = [
  '솔루션', '플랫폼', '시스템', '서비스', '기술', '개발', '제공', '업계', '사업',
  'solution', 'platform', 'system', 'service', 'technology', 'development', 'provide', 'industry', 'business',
];

/** Categories that get a flat bonus */
export const WEIGHTED_CATEGORIES: readonly string[] = [
  'it_software', 'game', 'finance', 'manufacturing', 'security',
];

export const SCORE = {
  BASE: 1000,
  PER_CHAR: 10,
  COMPACT: 500,
  PRIORITY: 800,
  PRIORITY_IN_PRIORITY_QUERY: 2000,
  GENERIC: -600,
  GENERIC_IN_PRIORITY_QUERY: -1000,
  CATEGORY: 100,
} as const;

const COMPACT_MIN_LENGTH = 4;
const ALNUM_RE = /^[\p{L}\p{N}]+$/u;

const prioritySet = new Set(PRIORITY_KEYWORDS);
const genericSet = new Set(GENERIC_KEYWORDS);
const weightedCategories = new Set(WEIGHTED_CATEGORIES);

export function hasPriorityKeyword(queryLower: string): boolean {
  return PRIORITY_KEYWORDS.some(k => queryLower.includes(k));
}

/**
 * Priority score of a keyword already known to be contained in the query.
 * Contributions are independent and additive.
 */
export function scoreKeyword(keyword: string, category: string, queryHasPriority: boolean): number {
  const lower = keyword.toLowerCase();
  const length = [...keyword].length;
  let score = SCORE.BASE + SCORE.PER_CHAR * length;

  if (length >= COMPACT_MIN_LENGTH && !/\s/.test(keyword) && ALNUM_RE.test(keyword)) {
    score += SCORE.COMPACT;
  }

  if (prioritySet.has(lower)) {
    score += SCORE.PRIORITY;
    if (queryHasPriority) score += SCORE.PRIORITY_IN_PRIORITY_QUERY;
  }

  if (genericSet.has(lower)) {
    score += SCORE.GENERIC;
    if (queryHasPriority) score += SCORE.GENERIC_IN_PRIORITY_QUERY;
  }

  if (weightedCategories.has(category)) {
    score += SCORE.CATEGORY;
  }

  return score;
}

export class ExactKeywordMatcher {
  constructor(private readonly catalog: KeywordCatalog) {}

  /**
   * Every catalog keyword contained in the query, best first.
   * A keyword listed under two categories yields two candidates.
   */
  findExactMatches(query: string): MatchCandidate[] {
    const queryLower = query.toLowerCase();
    const queryHasPriority = hasPriorityKeyword(queryLower);
    const matches: MatchCandidate[] = [];

    for (const { keyword, category } of this.catalog.entries()) {
      if (!queryLower.includes(keyword.toLowerCase())) continue;

      matches.push({
        keyword,
        category,
        matchType: 'exact',
        confidence: 1.0,
        priorityScore: scoreKeyword(keyword, category, queryHasPriority),
      });
    }

    return matches.sort((a, b) => (b.priorityScore ?? 0) - (a.priorityScore ?? 0));
  }
}
