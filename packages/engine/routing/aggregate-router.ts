// Aggregate analysis router
// Ordered (predicate, build) rules: the first rule whose terms appear in the
// question picks the aggregate. Reordering the list changes behaviour.

import type { AggregateKind, AggregateParams, AggregateRoute } from '../types/analysis.js';
import {
  extractMultiple,
  extractSector,
  extractReportYear,
  extractTopN,
  findMultiples,
} from './param-extractor.js';
import {
  ACCOUNTING_FIRM_TERMS,
  AVERAGE_TERMS,
  COMPARE_TERMS,
  COMPOSITION_TERMS,
  DEBT_EQUITY_TERMS,
  ENTERPRISE_VALUE_TERMS,
  HIGH_TERMS,
  INVESTMENT_TERMS,
  MAPPING_TERMS,
  MEDIAN_TERMS,
  NOA_COMPOSITION_TERMS,
  NOA_TERMS,
  NON_DISCLOSURE_TERMS,
  PERPETUAL_CASHFLOW_TERMS,
  RATIO_TERMS,
  RECENT_TERMS,
  SECTOR_TERMS,
  STATISTICS_TERMS,
  TOP_TERMS,
  TRANSACTION_TERMS,
  TREND_TERMS,
  VALUATOR_TERMS,
  VIOLATION_TERMS,
  WACC_TERMS,
  YEARLY_STATISTICS_TERMS,
  YEARLY_TERMS,
  containsAny,
} from './vocabulary.js';

export interface AggregateRule {
  readonly kind: AggregateKind;
  readonly matches: (question: string) => boolean;
  readonly params: (question: string) => AggregateParams;
}

/** A standalone "g" (perpetual growth rate), not a letter inside a word or an abbreviation like "e.g." */
const GROWTH_TOKEN_RE = /(?<![A-Za-z.])g(?![A-Za-z.])/i;

export const RECENT_VALUATOR_LIMIT = 5;
export const NOA_EV_TOP_N = 10;

const has = containsAny;
const hasWacc = (q: string) => has(q, WACC_TERMS);
const hasSector = (q: string) => has(q, SECTOR_TERMS);
const noParams = (): AggregateParams => ({});

function optionalSector(question: string): AggregateParams {
  const sector = extractSector(question);
  return sector ? { sector } : {};
}

export const AGGREGATE_RULES: readonly AggregateRule[] = [
  {
    kind: 'industry-wacc-median',
    matches: q => hasSector(q) && hasWacc(q) && has(q, MEDIAN_TERMS),
    params: () => ({ metric: 'WACC' }),
  },
  {
    kind: 'valuator-wacc-comparison',
    matches: q => has(q, VALUATOR_TERMS) && hasWacc(q) && (has(q, COMPARE_TERMS) || has(q, MEDIAN_TERMS)),
    params: () => ({ metric: 'WACC' }),
  },
  {
    kind: 'growth-wacc-violation',
    matches: q => (has(q, VIOLATION_TERMS) || GROWTH_TOKEN_RE.test(q)) && hasWacc(q),
    params: noParams,
  },
  {
    kind: 'debt-equity-disclosure-impact',
    matches: q => has(q, NON_DISCLOSURE_TERMS) && has(q, DEBT_EQUITY_TERMS),
    params: noParams,
  },
  {
    kind: 'wacc-top-n',
    matches: q => has(q, TOP_TERMS) && hasWacc(q),
    params: q => ({ topN: extractTopN(q) }),
  },
  {
    kind: 'recent-valuator-activity',
    matches: q => has(q, RECENT_TERMS) && (has(q, VALUATOR_TERMS) || has(q, ACCOUNTING_FIRM_TERMS)),
    params: () => ({ topN: RECENT_VALUATOR_LIMIT }),
  },
  {
    kind: 'industry-multiple-median',
    matches: q => hasSector(q) && has(q, MEDIAN_TERMS) && findMultiples(q).length > 0,
    params: q => ({ metric: extractMultiple(q), ...optionalSector(q) }),
  },
  {
    kind: 'perpetual-cashflow-ratio',
    matches: q => has(q, PERPETUAL_CASHFLOW_TERMS) && has(q, RATIO_TERMS),
    params: noParams,
  },
  {
    kind: 'non-operating-asset-composition',
    matches: q => has(q, NOA_COMPOSITION_TERMS) || (has(q, NOA_TERMS) && has(q, COMPOSITION_TERMS)),
    params: optionalSector,
  },
  {
    kind: 'investment-mapping',
    matches: q => has(q, INVESTMENT_TERMS) && has(q, MAPPING_TERMS),
    params: noParams,
  },
  {
    kind: 'sector-transaction-matrix',
    matches: q => hasSector(q) && has(q, TRANSACTION_TERMS),
    params: noParams,
  },
  {
    kind: 'noa-ev-ratio',
    matches: q => has(q, ENTERPRISE_VALUE_TERMS) && has(q, NOA_TERMS) && has(q, HIGH_TERMS),
    params: () => ({ topN: NOA_EV_TOP_N }),
  },
  {
    kind: 'year-sector-average-wacc',
    matches: q => extractReportYear(q) !== null && hasWacc(q) && has(q, AVERAGE_TERMS),
    params: q => ({ year: extractReportYear(q) ?? undefined, ...optionalSector(q) }),
  },
  {
    kind: 'yearly-key-statistics',
    matches: q => extractReportYear(q) !== null && (has(q, YEARLY_STATISTICS_TERMS) || has(q, STATISTICS_TERMS)),
    params: q => ({ year: extractReportYear(q) ?? undefined }),
  },
  {
    kind: 'wacc-trend',
    matches: q => has(q, TREND_TERMS) && hasWacc(q) && (has(q, YEARLY_TERMS) || hasSector(q)),
    params: noParams,
  },
];

export class AggregateAnalysisRouter {
  constructor(private readonly rules: readonly AggregateRule[] = AGGREGATE_RULES) {}

  /** The first matching aggregate, or null when no rule applies (unresolved) */
  route(question: string): AggregateRoute | null {
    const rule = this.rules.find(r => r.matches(question));
    return rule ? { kind: rule.kind, params: rule.params(question) } : null;
  }
}

/** Stateless shortcut over the default rule list */
export function extractAggregateParams(question: string): AggregateRoute | null {
  return defaultRouter.route(question);
}

const defaultRouter = new AggregateAnalysisRouter();
