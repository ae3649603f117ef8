// Intent classification: ordered rules, first match wins.
// A question naming both a similar-company term and WACC is a similar-company
// question; reordering INTENT_RULES changes answers.

import { VOCABULARY } from '../config/vocabulary.js';
import type { SimilarCompanyKeywordResolver } from '../matching/similar-company-resolver.js';
import type { AnalysisIntent } from '../types/analysis.js';
import { AggregateAnalysisRouter } from './aggregate-router.js';
import { extractSector, extractStartDate } from './param-extractor.js';
import {
  ANALYTICAL_TERMS,
  FINANCIAL_RATIO_TERMS,
  SIMILAR_COMPANY_TERMS,
  containsAny,
} from './vocabulary.js';

export interface IntentContext {
  resolver: SimilarCompanyKeywordResolver;
  router: AggregateAnalysisRouter;
  defaultRatioSector: string;
}

export interface IntentRule {
  readonly name: string;
  readonly matches: (question: string) => boolean;
  readonly resolve: (question: string, ctx: IntentContext) => AnalysisIntent;
}

export const INTENT_RULES: readonly IntentRule[] = [
  {
    name: 'similar-company',
    matches: q => containsAny(q, SIMILAR_COMPANY_TERMS),
    resolve: (q, ctx) => {
      const resolution = ctx.resolver.resolve(q);
      return {
        type: 'similar_company',
        keyword: resolution?.keyword ?? null,
        source: resolution?.source ?? null,
        match: resolution?.match ?? null,
      };
    },
  },
  {
    name: 'aggregate-analysis',
    matches: q => containsAny(q, ANALYTICAL_TERMS),
    resolve: (q, ctx) => {
      const route = ctx.router.route(q);
      return route
        ? { type: 'aggregate_report', kind: route.kind, params: route.params }
        : { type: 'unresolved_aggregate' };
    },
  },
  {
    name: 'financial-ratio',
    matches: q => containsAny(q, FINANCIAL_RATIO_TERMS),
    resolve: (q, ctx) => {
      const sector = extractSector(q);
      return {
        type: 'financial_ratio',
        sector: sector ?? ctx.defaultRatioSector,
        sectorDefaulted: sector === null,
        startDate: extractStartDate(q),
      };
    },
  },
  {
    name: 'generic-sector-search',
    matches: () => true,
    resolve: q => ({ type: 'generic_sector_search', sector: q.trim() }),
  },
];

export class IntentClassifier {
  private readonly ctx: IntentContext;
  private readonly rules: readonly IntentRule[];

  constructor(
    resolver: SimilarCompanyKeywordResolver,
    options: { router?: AggregateAnalysisRouter; defaultRatioSector?: string; rules?: readonly IntentRule[] } = {},
  ) {
    this.ctx = {
      resolver,
      router: options.router ?? new AggregateAnalysisRouter(),
      defaultRatioSector: options.defaultRatioSector ?? VOCABULARY.defaultRatioSector,
    };
    this.rules = options.rules ?? INTENT_RULES;
  }

  classify(question: string): AnalysisIntent {
    for (const rule of this.rules) {
      if (rule.matches(question)) return rule.resolve(question, this.ctx);
    }
    return { type: 'generic_sector_search', sector: question.trim() };
  }

  /** Name of the rule that would handle the question */
  ruleFor(question: string): string | null {
    return this.rules.find(r => r.matches(question))?.name ?? null;
  }
}
