// Question analysis: intents, aggregate routes and aggregate outcomes
// An intent is built fresh per question and discarded after the answer

import type { MatchCandidate } from './catalog.js';
import type { ReportField, ValuationReport } from './reports.js';

export const AGGREGATE_KINDS = [
  'industry-wacc-median',
  'valuator-wacc-comparison',
  'growth-wacc-violation',
  'debt-equity-disclosure-impact',
  'wacc-top-n',
  'recent-valuator-activity',
  'industry-multiple-median',
  'perpetual-cashflow-ratio',
  'non-operating-asset-composition',
  'investment-mapping',
  'sector-transaction-matrix',
  'noa-ev-ratio',
  'year-sector-average-wacc',
  'yearly-key-statistics',
  'wacc-trend',
] as const;

export type AggregateKind = typeof AGGREGATE_KINDS[number];

export const MULTIPLE_NAMES = ['EV/EBITDA', 'EV/Sales', 'PSR', 'PER', 'PBR'] as const;

export type MultipleName = typeof MULTIPLE_NAMES[number];

export type AggregateMetric = 'WACC' | MultipleName;

export interface AggregateParams {
  year?: number;
  sector?: string;
  metric?: AggregateMetric;
  topN?: number;
  issuer?: string;     // investment-mapping drill-down
}

export interface AggregateRoute {
  readonly kind: AggregateKind;
  readonly params: AggregateParams;
}

export type KeywordSource = 'smart_search' | 'fallback';

export type AnalysisIntent =
  | {
      readonly type: 'similar_company';
      readonly keyword: string | null;
      readonly source: KeywordSource | null;
      readonly match: MatchCandidate | null;
    }
  | {
      readonly type: 'financial_ratio';
      readonly sector: string;
      readonly sectorDefaulted: boolean;
      readonly startDate: string | null;
    }
  | { readonly type: 'aggregate_report'; readonly kind: AggregateKind; readonly params: AggregateParams }
  | { readonly type: 'unresolved_aggregate' }
  | { readonly type: 'generic_sector_search'; readonly sector: string };

export type IntentType = AnalysisIntent['type'];

// ── Aggregate results ───────────────────────────────────────────────

export interface StatSummary {
  count: number;
  mean: number | null;
  median: number | null;
  stdDev: number | null;     // sample (n - 1)
  min: number | null;
  max: number | null;
}

export interface ItemCount {
  item: string;
  count: number;
}

export interface SectorMedian {
  sector: string;
  median: number;
  count: number;
}

export interface SectorRatio {
  sector: string;
  meanRatio: number;
  count: number;
}

export interface RatioRow {
  report: ValuationReport;
  ratio: number;
}

export interface ValuatorWacc {
  valuator: string;
  count: number;
  mean: number;
  median: number;
}

export interface GrowthViolationReport {
  violations: ValuationReport[];
  checked: number;
  violationRate: number;
}

export interface DisclosureImpact {
  disclosedCount: number;
  undisclosedCount: number;
  disclosedMeanWacc: number | null;
  undisclosedMeanWacc: number | null;
  delta: number | null;
}

export interface WaccTopN {
  topN: number;
  reports: ValuationReport[];
}

export interface ValuatorActivity {
  windowStart: string;
  windowEnd: string;
  ranking: Array<{ valuator: string; count: number }>;
}

export interface MultipleMedian {
  metric: MultipleName;
  sector: string | null;
  bySector: SectorMedian[];
}

export interface PerpetualCashflowRatio {
  checked: number;
  highRatio: RatioRow[];
  bySector: SectorRatio[];
  distribution: Array<{ bucket: string; count: number }>;
}

export interface NoaComposition {
  overall: ItemCount[];
  bySector: Array<{ sector: string; items: ItemCount[] }>;
}

export interface InvestmentMapping {
  totalReports: number;
  issuers: Array<{ issuer: string; count: number; targets: string[] }>;
  portfolio: { issuer: string; holdings: ValuationReport[] } | null;
}

export interface TransactionMatrix {
  issuerSectors: string[];
  targetSectors: string[];
  counts: number[][];        // [issuer][target]
  byPurpose: Array<{ purpose: string; count: number }>;
}

export interface NoaEvRatio {
  top: RatioRow[];
  bySector: SectorRatio[];
}

export interface YearSectorWacc {
  year: number;
  sector: string | null;
  summary: StatSummary;
}

export interface YearlyKeyStatistics {
  year: number;
  rowCount: number;
  uniqueIssuers: number;
  uniqueTargets: number;
  uniqueValuators: number;
  wacc: StatSummary;
  sectorDistribution: ItemCount[];
  multipleMedians: Array<{ metric: MultipleName; median: number; count: number }>;
  topValuators: ItemCount[];
  monthlyIssuance: Array<{ month: string; count: number }>;
}

export interface TrendCell {
  mean: number | null;
  median: number | null;
  count: number;
}

export interface WaccTrend {
  years: number[];
  sectors: string[];
  cells: TrendCell[][];      // [year][sector]
}

export interface AggregateResultMap {
  'industry-wacc-median': SectorMedian[];
  'valuator-wacc-comparison': ValuatorWacc[];
  'growth-wacc-violation': GrowthViolationReport;
  'debt-equity-disclosure-impact': DisclosureImpact;
  'wacc-top-n': WaccTopN;
  'recent-valuator-activity': ValuatorActivity;
  'industry-multiple-median': MultipleMedian;
  'perpetual-cashflow-ratio': PerpetualCashflowRatio;
  'non-operating-asset-composition': NoaComposition;
  'investment-mapping': InvestmentMapping;
  'sector-transaction-matrix': TransactionMatrix;
  'noa-ev-ratio': NoaEvRatio;
  'year-sector-average-wacc': YearSectorWacc;
  'yearly-key-statistics': YearlyKeyStatistics;
  'wacc-trend': WaccTrend;
}

export type AggregateSuccess = {
  [K in AggregateKind]: {
    readonly status: 'ok';
    readonly kind: K;
    readonly params: AggregateParams;
    readonly data: AggregateResultMap[K];
  };
}[AggregateKind];

export interface AggregateInsufficient {
  readonly status: 'insufficient_data';
  readonly kind: AggregateKind;
  readonly params: AggregateParams;
  readonly missingFields: ReportField[];
}

export type AggregateOutcome = AggregateSuccess | AggregateInsufficient;
