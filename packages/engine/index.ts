// Valuation disclosure Q&A engine
// Keyword matching, intent classification, aggregate routing and report analytics

export * from './types/index.js';

// Catalog and vocabulary
export { KeywordCatalog, DEFAULT_KEYWORDS_PATH, DEFAULT_INDUSTRIES_PATH } from './config/keyword-catalog.js';
export type { CatalogLoadOptions } from './config/keyword-catalog.js';
export { VOCABULARY } from './config/vocabulary.js';
export type { Vocabulary } from './config/vocabulary.js';

// Matching
export { ExactKeywordMatcher, scoreKeyword } from './matching/exact-matcher.js';
export { FuzzyIndustryMatcher, SIMILARITY_THRESHOLD } from './matching/fuzzy-matcher.js';
export { similarityRatio } from './matching/similarity.js';
export { SmartSearchResolver } from './matching/smart-search.js';
export { SimilarCompanyKeywordResolver, extractFallbackKeyword } from './matching/similar-company-resolver.js';
export type { KeywordResolution } from './matching/similar-company-resolver.js';

// Routing
export { IntentClassifier, INTENT_RULES } from './routing/intent-classifier.js';
export type { IntentRule, IntentContext } from './routing/intent-classifier.js';
export { AggregateAnalysisRouter, AGGREGATE_RULES } from './routing/aggregate-router.js';
export type { AggregateRule } from './routing/aggregate-router.js';
export {
  extractYear,
  extractReportYear,
  isReportYear,
  extractSector,
  extractTopN,
  extractMultiple,
  extractStartDate,
} from './routing/param-extractor.js';

// Operations
export {
  classifyIntent,
  createKeywordResolver,
  extractAggregateParams,
  resolveSimilarCompanyKeyword,
} from './src/operations.js';

// Analytics
export { parseNumeric, normalizeDate, normalizeReport, parseReportRecords } from './analytics/normalize.js';
export { mean, median, stdDev, summarize } from './analytics/stats.js';
export { runAggregate, requiredFields } from './analytics/run-aggregate.js';

// Data access: backend selected from VQA_DATA_BACKEND
export { DataAccessError, InMemoryReportRepository } from './db/report-repository.js';
export type { ReportRepository } from './db/report-repository.js';
export { PgReportRepository } from './db/pg-report-repository.js';
export { createReportRepository, getBackend } from './config/database.js';
export type { DataBackend } from './config/database.js';

// Answering
export { QuestionAnswerer, createQuestionAnswerer } from './src/pipeline.js';
export type { AnswerResult, PipelineConfig } from './src/pipeline.js';
export { formatAggregate, generateStructuredSentences } from './utils/answer-formatter.js';
export { ConversationLog } from './utils/conversation-log.js';
export type { ConversationEntry } from './utils/conversation-log.js';
