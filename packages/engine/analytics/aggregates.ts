// Aggregate computations selected by the router.
// Each function is pure over normalized rows; callers check the required
// fields first (see run-aggregate.ts).

import { VOCABULARY } from '../config/vocabulary.js';
import { DEFAULT_MULTIPLE, DEFAULT_TOP_N } from '../routing/param-extractor.js';
import { NOA_EV_TOP_N, RECENT_VALUATOR_LIMIT } from '../routing/aggregate-router.js';
import { containsTerm } from '../routing/vocabulary.js';
import type {
  AggregateMetric,
  AggregateParams,
  DisclosureImpact,
  GrowthViolationReport,
  InvestmentMapping,
  MultipleMedian,
  MultipleName,
  NoaComposition,
  NoaEvRatio,
  PerpetualCashflowRatio,
  RatioRow,
  SectorMedian,
  SectorRatio,
  TransactionMatrix,
  ValuatorActivity,
  ValuatorWacc,
  WaccTopN,
  WaccTrend,
  YearSectorWacc,
  YearlyKeyStatistics,
} from '../types/analysis.js';
import { MULTIPLE_NAMES } from '../types/analysis.js';
import type { NumericReportField, ValuationReport } from '../types/reports.js';
import { countBy, groupBy, mean, median, summarize } from './stats.js';

export const MULTIPLE_FIELDS: Record<MultipleName, NumericReportField> = {
  'EV/EBITDA': 'evEbitda',
  'EV/Sales': 'evSales',
  PSR: 'psr',
  PER: 'per',
  PBR: 'pbr',
};

export const HIGH_PERPETUAL_RATIO = 0.5;
export const RECENT_WINDOW_DAYS = 365;
const SECTOR_DISTRIBUTION_LIMIT = 10;
const TOP_VALUATORS_LIMIT = 5;
const COMPOSITION_TOP = 5;

const RATIO_BUCKETS: ReadonlyArray<{ label: string; min: number; max: number }> = [
  { label: '0-20%', min: 0, max: 0.2 },
  { label: '20-40%', min: 0.2, max: 0.4 },
  { label: '40-60%', min: 0.4, max: 0.6 },
  { label: '60-80%', min: 0.6, max: 0.8 },
  { label: '80-100%', min: 0.8, max: 1.0000001 },
];

// ── Row helpers ─────────────────────────────────────────────────────

/** Sector a row is grouped under: target sector, else issuer sector */
export function groupingSector(row: ValuationReport): string | null {
  return row.targetSector ?? row.issuerSector ?? null;
}

/** Sector filters look at issuer sector, target sector and target business; an ASCII sector must not touch other letters */
export function matchesSector(row: ValuationReport, sector: string): boolean {
  return [row.issuerSector, row.targetSector, row.targetBusiness].some(
    value => (value ? containsTerm(value, sector) : false),
  );
}

export function reportYear(row: ValuationReport): number | null {
  return row.issueDate ? Number(row.issueDate.slice(0, 4)) : null;
}

function numbers(rows: readonly ValuationReport[], field: NumericReportField): number[] {
  const out: number[] = [];
  for (const row of rows) {
    const v = row[field];
    if (typeof v === 'number') out.push(v);
  }
  return out;
}

function withWacc(rows: readonly ValuationReport[]): Array<ValuationReport & { wacc: number }> {
  const out: Array<ValuationReport & { wacc: number }> = [];
  for (const row of rows) {
    if (typeof row.wacc === 'number') out.push({ ...row, wacc: row.wacc });
  }
  return out;
}

function sectorMedians(rows: readonly ValuationReport[], field: NumericReportField): SectorMedian[] {
  const result: SectorMedian[] = [];
  for (const [sector, group] of groupBy(rows, groupingSector)) {
    const values = numbers(group, field);
    const m = median(values);
    if (m !== null) result.push({ sector, median: m, count: values.length });
  }
  return result.sort((a, b) => b.median - a.median);
}

function sectorRatios(rows: readonly RatioRow[]): SectorRatio[] {
  const result: SectorRatio[] = [];
  for (const [sector, group] of groupBy(rows, r => groupingSector(r.report))) {
    const m = mean(group.map(r => r.ratio));
    if (m !== null) result.push({ sector, meanRatio: m, count: group.length });
  }
  return result.sort((a, b) => b.meanRatio - a.meanRatio);
}

function multipleOf(metric: AggregateMetric | undefined): MultipleName {
  return metric !== undefined && metric !== 'WACC' ? metric : DEFAULT_MULTIPLE;
}

function compactPurpose(purpose: string): string {
  return purpose.replace(/\s+/g, '');
}

function shiftDays(isoDate: string, days: number): string {
  const d = new Date(`${isoDate}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/** Latest year in the data; used when a per-year aggregate has no year */
function latestYear(rows: readonly ValuationReport[]): number | null {
  let latest: number | null = null;
  for (const row of rows) {
    const y = reportYear(row);
    if (y !== null && (latest === null || y > latest)) latest = y;
  }
  return latest;
}

// ── Aggregates ──────────────────────────────────────────────────────

export function industryWaccMedian(rows: readonly ValuationReport[]): SectorMedian[] {
  return sectorMedians(rows, 'wacc');
}

export function valuatorWaccComparison(rows: readonly ValuationReport[]): ValuatorWacc[] {
  const result: ValuatorWacc[] = [];
  for (const [valuator, group] of groupBy(withWacc(rows), r => r.valuator ?? null)) {
    const values = group.map(r => r.wacc);
    const m = mean(values);
    const med = median(values);
    if (m !== null && med !== null) {
      result.push({ valuator, count: values.length, mean: m, median: med });
    }
  }
  return result.sort((a, b) => b.median - a.median);
}

/** Rows whose perpetual growth rate is not below WACC */
export function growthWaccViolation(rows: readonly ValuationReport[]): GrowthViolationReport {
  const checked = rows.filter(r => typeof r.growthRate === 'number' && typeof r.wacc === 'number');
  const violations = checked.filter(r => (r.growthRate ?? 0) >= (r.wacc ?? 0));
  return {
    violations,
    checked: checked.length,
    violationRate: checked.length > 0 ? violations.length / checked.length : 0,
  };
}

export function debtEquityDisclosureImpact(rows: readonly ValuationReport[]): DisclosureImpact {
  const scored = withWacc(rows);
  const disclosed = scored.filter(r => typeof r.debtToEquity === 'number').map(r => r.wacc);
  const undisclosed = scored.filter(r => typeof r.debtToEquity !== 'number').map(r => r.wacc);
  const disclosedMeanWacc = mean(disclosed);
  const undisclosedMeanWacc = mean(undisclosed);
  return {
    disclosedCount: disclosed.length,
    undisclosedCount: undisclosed.length,
    disclosedMeanWacc,
    undisclosedMeanWacc,
    delta:
      disclosedMeanWacc !== null && undisclosedMeanWacc !== null
        ? disclosedMeanWacc - undisclosedMeanWacc
        : null,
  };
}

export function waccTopN(rows: readonly ValuationReport[], params: AggregateParams): WaccTopN {
  const topN = params.topN ?? DEFAULT_TOP_N;
  const reports = withWacc(rows)
    .sort((a, b) => b.wacc - a.wacc)
    .slice(0, topN);
  return { topN, reports };
}

/** Valuators ranked by report count over the year before the latest report */
export function recentValuatorActivity(
  rows: readonly ValuationReport[],
  params: AggregateParams,
): ValuatorActivity {
  const windowEnd = rows.reduce((max, r) => (r.issueDate && r.issueDate > max ? r.issueDate : max), '');
  if (windowEnd === '') return { windowStart: '', windowEnd: '', ranking: [] };

  const windowStart = shiftDays(windowEnd, -RECENT_WINDOW_DAYS);
  const recent = rows.filter(r => r.valuator && (r.issueDate ?? '') >= windowStart);
  const ranking = countBy(recent.map(r => r.valuator ?? ''))
    .slice(0, params.topN ?? RECENT_VALUATOR_LIMIT)
    .map(({ item, count }) => ({ valuator: item, count }));
  return { windowStart, windowEnd, ranking };
}

export function industryMultipleMedian(
  rows: readonly ValuationReport[],
  params: AggregateParams,
): MultipleMedian {
  const metric = multipleOf(params.metric);
  const sector = params.sector ?? null;
  const scoped = sector ? rows.filter(r => matchesSector(r, sector)) : rows;
  return { metric, sector, bySector: sectorMedians(scoped, MULTIPLE_FIELDS[metric]) };
}

/** Terminal-value share of enterprise value: 1 - PV share of the forecast period */
export function perpetualCashflowRatio(rows: readonly ValuationReport[]): PerpetualCashflowRatio {
  const ratios: RatioRow[] = [];
  for (const report of rows) {
    const fraction = report.pvFraction;
    if (typeof fraction === 'number' && fraction >= 0 && fraction <= 1) {
      ratios.push({ report, ratio: 1 - fraction });
    }
  }

  const highRatio = ratios
    .filter(r => r.ratio >= HIGH_PERPETUAL_RATIO)
    .sort((a, b) => b.ratio - a.ratio);

  const distribution = RATIO_BUCKETS.map(({ label, min, max }) => ({
    bucket: label,
    count: ratios.filter(r => r.ratio >= min && r.ratio < max).length,
  }));

  return { checked: ratios.length, highRatio, bySector: sectorRatios(ratios), distribution };
}

export function tokenizeComposition(text: string): string[] {
  return text
    .split(/[,;]/)
    .map(t => t.trim())
    .filter(t => t.length > 0);
}

export function nonOperatingAssetComposition(
  rows: readonly ValuationReport[],
  params: AggregateParams,
): NoaComposition {
  const composed = rows.filter(r => r.noaComposition);
  const tokens = (group: readonly ValuationReport[]) =>
    group.flatMap(r => tokenizeComposition(r.noaComposition ?? ''));

  const overall = countBy(tokens(composed)).slice(0, COMPOSITION_TOP);

  const selected = params.sector;
  if (selected) {
    const items = countBy(tokens(composed.filter(r => matchesSector(r, selected)))).slice(0, COMPOSITION_TOP);
    return { overall, bySector: [{ sector: selected, items }] };
  }

  const bySector = [...groupBy(composed, groupingSector)]
    .map(([sector, group]) => ({ sector, all: tokens(group) }))
    .sort((a, b) => b.all.length - a.all.length)
    .map(({ sector, all }) => ({ sector, items: countBy(all).slice(0, COMPOSITION_TOP) }));
  return { overall, bySector };
}

export function investmentMapping(
  rows: readonly ValuationReport[],
  params: AggregateParams,
  purposes: readonly string[] = VOCABULARY.investmentPurposes,
): InvestmentMapping {
  const accepted = new Set(purposes.map(compactPurpose));
  const investments = rows.filter(r => r.reportPurpose && accepted.has(compactPurpose(r.reportPurpose)));

  const byIssuer = groupBy(investments, r => r.issuerName ?? null);
  const issuers = [...byIssuer]
    .map(([issuer, group]) => ({
      issuer,
      count: group.length,
      targets: [...new Set(group.flatMap(r => (r.targetName ? [r.targetName] : [])))],
    }))
    .sort((a, b) => b.count - a.count);

  const holdings = params.issuer ? byIssuer.get(params.issuer) : undefined;
  return {
    totalReports: investments.length,
    issuers,
    portfolio: params.issuer ? { issuer: params.issuer, holdings: holdings ?? [] } : null,
  };
}

export function sectorTransactionMatrix(rows: readonly ValuationReport[]): TransactionMatrix {
  const pairs = rows.flatMap(r =>
    r.issuerSector && r.targetSector ? [{ issuer: r.issuerSector, target: r.targetSector }] : [],
  );
  const issuerSectors = countBy(pairs.map(p => p.issuer)).map(c => c.item);
  const targetSectors = countBy(pairs.map(p => p.target)).map(c => c.item);

  const counts = issuerSectors.map(() => targetSectors.map(() => 0));
  for (const { issuer, target } of pairs) {
    counts[issuerSectors.indexOf(issuer)][targetSectors.indexOf(target)] += 1;
  }

  const byPurpose = countBy(rows.flatMap(r => (r.reportPurpose ? [r.reportPurpose] : []))).map(
    ({ item, count }) => ({ purpose: item, count }),
  );
  return { issuerSectors, targetSectors, counts, byPurpose };
}

export function noaEvRatio(rows: readonly ValuationReport[], params: AggregateParams): NoaEvRatio {
  const ratios: RatioRow[] = [];
  for (const report of rows) {
    const noa = report.nonOperatingAssets;
    const ev = report.enterpriseValue;
    if (typeof noa === 'number' && typeof ev === 'number' && ev > 0) {
      ratios.push({ report, ratio: noa / ev });
    }
  }
  const top = [...ratios].sort((a, b) => b.ratio - a.ratio).slice(0, params.topN ?? NOA_EV_TOP_N);
  return { top, bySector: sectorRatios(ratios) };
}

export function yearSectorAverageWacc(
  rows: readonly ValuationReport[],
  params: AggregateParams,
): YearSectorWacc {
  const year = params.year ?? latestYear(rows) ?? new Date().getFullYear();
  const sector = params.sector ?? null;
  const scoped = rows.filter(r => reportYear(r) === year && (sector === null || matchesSector(r, sector)));
  return { year, sector, summary: summarize(numbers(scoped, 'wacc')) };
}

export function yearlyKeyStatistics(
  rows: readonly ValuationReport[],
  params: AggregateParams,
): YearlyKeyStatistics {
  const year = params.year ?? latestYear(rows) ?? new Date().getFullYear();
  const scoped = rows.filter(r => reportYear(r) === year);
  const distinct = (pick: (r: ValuationReport) => string | null | undefined) =>
    new Set(scoped.flatMap(r => {
      const v = pick(r);
      return v ? [v] : [];
    })).size;

  const multipleMedians: YearlyKeyStatistics['multipleMedians'] = [];
  for (const metric of MULTIPLE_NAMES) {
    const values = numbers(scoped, MULTIPLE_FIELDS[metric]);
    const m = median(values);
    if (m !== null) multipleMedians.push({ metric, median: m, count: values.length });
  }

  const monthly = countBy(scoped.flatMap(r => (r.issueDate ? [r.issueDate.slice(0, 7)] : [])));

  return {
    year,
    rowCount: scoped.length,
    uniqueIssuers: distinct(r => r.issuerName),
    uniqueTargets: distinct(r => r.targetName),
    uniqueValuators: distinct(r => r.valuator),
    wacc: summarize(numbers(scoped, 'wacc')),
    sectorDistribution: countBy(scoped.flatMap(r => {
      const s = groupingSector(r);
      return s ? [s] : [];
    })).slice(0, SECTOR_DISTRIBUTION_LIMIT),
    multipleMedians,
    topValuators: countBy(scoped.flatMap(r => (r.valuator ? [r.valuator] : []))).slice(0, TOP_VALUATORS_LIMIT),
    monthlyIssuance: monthly
      .map(({ item, count }) => ({ month: item, count }))
      .sort((a, b) => a.month.localeCompare(b.month)),
  };
}

/** Year × sector pivot of WACC over the fixed trend axes */
export function waccTrend(
  rows: readonly ValuationReport[],
  years: readonly number[] = VOCABULARY.trendYears,
  sectors: readonly string[] = VOCABULARY.trendSectors,
): WaccTrend {
  const cells = years.map(year => {
    const inYear = rows.filter(r => reportYear(r) === year);
    return sectors.map(sector => {
      const values = numbers(inYear.filter(r => matchesSector(r, sector)), 'wacc');
      return { mean: mean(values), median: median(values), count: values.length };
    });
  });
  return { years: [...years], sectors: [...sectors], cells };
}
