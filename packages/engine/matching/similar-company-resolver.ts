// Resolves the business keyword behind a similar-company question.
// Smart search first; when the catalog yields nothing, fall back to the
// business list, then to "<word> 사업"-style patterns, then to the bare question.

import { VOCABULARY } from '../config/vocabulary.js';
import type { KeywordSource } from '../types/analysis.js';
import type { MatchCandidate } from '../types/catalog.js';
import { SIMILAR_COMPANY_TERMS, firstTermIn } from '../routing/vocabulary.js';
import type { SmartSearchResolver } from './smart-search.js';

export interface KeywordResolution {
  keyword: string;
  source: KeywordSource;
  match: MatchCandidate | null;
}

const WORD = '[\\p{L}\\p{N}_]+';

/** Tried in order; the first pattern with a usable capture wins */
const BUSINESS_PATTERNS: readonly RegExp[] = ['사업', '업종', '기업', '회사', '업계'].map(
  suffix => new RegExp(`(${WORD})\\s*${suffix}`, 'gu'),
);

const QUESTION_PHRASES = ['무엇인가요', '무엇입니까', '어떻게 되나요', '알려주세요', '알려줘', 'what are', 'what is', '?'];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const similarTermSet = new Set(SIMILAR_COMPANY_TERMS.map(t => t.toLowerCase()));

// Longest first so "유사기업" is removed before "유사"
const STRIP_RE = new RegExp(
  [...SIMILAR_COMPANY_TERMS, ...QUESTION_PHRASES]
    .sort((a, b) => b.length - a.length)
    .map(t => `${escapeRegExp(t)}(?:은|는|이|가|을|를|의)?`)
    .join('|'),
  'giu',
);

/**
 * Keyword extraction used when smart search finds nothing.
 * Returns null only when the question is empty once stripped.
 */
export function extractFallbackKeyword(
  question: string,
  businesses: readonly string[] = VOCABULARY.fallbackBusinesses,
): string | null {
  const listed = firstTermIn(question, businesses);
  if (listed) return listed;

  for (const pattern of BUSINESS_PATTERNS) {
    for (const match of question.matchAll(pattern)) {
      const word = match[1];
      if (word && !similarTermSet.has(word.toLowerCase())) return word;
    }
  }

  const stripped = question.replace(STRIP_RE, ' ').replace(/\s+/g, ' ').trim();
  return stripped.length > 0 ? stripped : null;
}

export class SimilarCompanyKeywordResolver {
  constructor(
    private readonly search: SmartSearchResolver,
    private readonly businesses: readonly string[] = VOCABULARY.fallbackBusinesses,
  ) {}

  /** Keyword to look up peers for, or null (not found) */
  resolve(question: string): KeywordResolution | null {
    const best = this.search.bestMatch(question);
    if (best) {
      return { keyword: best.keyword, source: 'smart_search', match: best };
    }

    const fallback = extractFallbackKeyword(question, this.businesses);
    return fallback ? { keyword: fallback, source: 'fallback', match: null } : null;
  }
}
