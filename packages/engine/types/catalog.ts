// Keyword catalog and match candidates
// The catalog is loaded once per process; candidates are built per question

/** Bucket name of the flattened keyword list used only for fuzzy matching */
export const ALL_KEYWORDS_BUCKET = 'all_keywords';

export interface KeywordEntry {
  readonly keyword: string;
  readonly category: string;
}

export interface SimilarIndustryEntry {
  readonly industry: string;
  readonly relatedKeywords: readonly string[];
}

export type MatchType = 'exact' | 'similar_industry' | 'similarity_based';

export interface MatchCandidate {
  readonly keyword: string;
  readonly category: string | null;
  readonly matchType: MatchType;
  readonly confidence: number;        // 0-1
  readonly priorityScore?: number;    // exact matches only
  readonly relatedKeywords?: readonly string[];
}

/** Raw shape of the keyword resource: category → keywords, plus `all_keywords` */
export type KeywordDefinitions = Record<string, string[]>;

/** Raw shape of the industry resource: industry → related keywords */
export type IndustryDefinitions = Record<string, string[]>;
