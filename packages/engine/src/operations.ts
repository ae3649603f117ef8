// One-call entry points over an explicitly supplied catalog

import type { KeywordCatalog } from '../config/keyword-catalog.js';
import { SimilarCompanyKeywordResolver } from '../matching/similar-company-resolver.js';
import type { KeywordResolution } from '../matching/similar-company-resolver.js';
import { SmartSearchResolver } from '../matching/smart-search.js';
import { IntentClassifier } from '../routing/intent-classifier.js';
import type { AnalysisIntent } from '../types/analysis.js';

export { extractAggregateParams } from '../routing/aggregate-router.js';

export function createKeywordResolver(catalog: KeywordCatalog): SimilarCompanyKeywordResolver {
  return new SimilarCompanyKeywordResolver(new SmartSearchResolver(catalog));
}

/** Business keyword behind a similar-company question, or null when nothing usable remains */
export function resolveSimilarCompanyKeyword(question: string, catalog: KeywordCatalog): KeywordResolution | null {
  return createKeywordResolver(catalog).resolve(question);
}

export function classifyIntent(question: string, catalog: KeywordCatalog): AnalysisIntent {
  return new IntentClassifier(createKeywordResolver(catalog)).classify(question);
}
