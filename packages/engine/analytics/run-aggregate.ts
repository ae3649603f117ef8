// Aggregate dispatch with required-field checks.
// A missing column yields an insufficient_data outcome, never an exception.

import type { AggregateKind, AggregateOutcome, AggregateParams } from '../types/analysis.js';
import type { ReportField, ValuationReport } from '../types/reports.js';
import {
  MULTIPLE_FIELDS,
  debtEquityDisclosureImpact,
  growthWaccViolation,
  industryMultipleMedian,
  industryWaccMedian,
  investmentMapping,
  noaEvRatio,
  nonOperatingAssetComposition,
  perpetualCashflowRatio,
  recentValuatorActivity,
  sectorTransactionMatrix,
  valuatorWaccComparison,
  waccTopN,
  waccTrend,
  yearSectorAverageWacc,
  yearlyKeyStatistics,
} from './aggregates.js';

const REQUIRED_FIELDS: Record<AggregateKind, readonly ReportField[]> = {
  'industry-wacc-median': ['wacc'],
  'valuator-wacc-comparison': ['valuator', 'wacc'],
  'growth-wacc-violation': ['growthRate', 'wacc'],
  'debt-equity-disclosure-impact': ['wacc'],
  'wacc-top-n': ['wacc'],
  'recent-valuator-activity': ['issueDate', 'valuator'],
  'industry-multiple-median': [],    // plus the selected multiple
  'perpetual-cashflow-ratio': ['pvFraction'],
  'non-operating-asset-composition': ['noaComposition'],
  'investment-mapping': ['reportPurpose', 'issuerName'],
  'sector-transaction-matrix': ['issuerSector', 'targetSector'],
  'noa-ev-ratio': ['nonOperatingAssets', 'enterpriseValue'],
  'year-sector-average-wacc': ['issueDate', 'wacc'],
  'yearly-key-statistics': ['issueDate'],
  'wacc-trend': ['issueDate', 'wacc'],
};

export function requiredFields(kind: AggregateKind, params: AggregateParams = {}): ReportField[] {
  const fields = [...REQUIRED_FIELDS[kind]];
  if (kind === 'industry-multiple-median') {
    const metric = params.metric !== undefined && params.metric !== 'WACC' ? params.metric : 'EV/EBITDA';
    fields.push(MULTIPLE_FIELDS[metric]);
  }
  return fields;
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined && value !== '';
}

/** Required fields that no row carries */
export function missingFields(
  rows: readonly ValuationReport[],
  fields: readonly ReportField[],
): ReportField[] {
  return fields.filter(field => !rows.some(row => isPresent(row[field])));
}

export function runAggregate(
  kind: AggregateKind,
  params: AggregateParams,
  rows: readonly ValuationReport[],
): AggregateOutcome {
  const missing = missingFields(rows, requiredFields(kind, params));
  if (missing.length > 0) {
    return { status: 'insufficient_data', kind, params, missingFields: missing };
  }

  switch (kind) {
    case 'industry-wacc-median':
      return { status: 'ok', kind, params, data: industryWaccMedian(rows) };
    case 'valuator-wacc-comparison':
      return { status: 'ok', kind, params, data: valuatorWaccComparison(rows) };
    case 'growth-wacc-violation':
      return { status: 'ok', kind, params, data: growthWaccViolation(rows) };
    case 'debt-equity-disclosure-impact':
      return { status: 'ok', kind, params, data: debtEquityDisclosureImpact(rows) };
    case 'wacc-top-n':
      return { status: 'ok', kind, params, data: waccTopN(rows, params) };
    case 'recent-valuator-activity':
      return { status: 'ok', kind, params, data: recentValuatorActivity(rows, params) };
    case 'industry-multiple-median':
      return { status: 'ok', kind, params, data: industryMultipleMedian(rows, params) };
    case 'perpetual-cashflow-ratio':
      return { status: 'ok', kind, params, data: perpetualCashflowRatio(rows) };
    case 'non-operating-asset-composition':
      return { status: 'ok', kind, params, data: nonOperatingAssetComposition(rows, params) };
    case 'investment-mapping':
      return { status: 'ok', kind, params, data: investmentMapping(rows, params) };
    case 'sector-transaction-matrix':
      return { status: 'ok', kind, params, data: sectorTransactionMatrix(rows) };
    case 'noa-ev-ratio':
      return { status: 'ok', kind, params, data: noaEvRatio(rows, params) };
    case 'year-sector-average-wacc':
      return { status: 'ok', kind, params, data: yearSectorAverageWacc(rows, params) };
    case 'yearly-key-statistics':
      return { status: 'ok', kind, params, data: yearlyKeyStatistics(rows, params) };
    case 'wacc-trend':
      return { status: 'ok', kind, params, data: waccTrend(rows) };
  }
}
