import { describe, it, expect } from 'vitest';
import {
  AGGREGATE_RULES,
  AggregateAnalysisRouter,
  extractAggregateParams,
} from '../routing/aggregate-router.js';
import { AGGREGATE_KINDS } from '../types/analysis.js';

describe('AggregateAnalysisRouter', () => {
  const router = new AggregateAnalysisRouter();

  it.each([
    ['IT 섹터 WACC 중앙값', 'industry-wacc-median', { metric: 'WACC' }],
    ['평가기관별 WACC 비교', 'valuator-wacc-comparison', { metric: 'WACC' }],
    ['g가 WACC보다 높은 사례', 'growth-wacc-violation', {}],
    ['WACC 위반 사례', 'growth-wacc-violation', {}],
    ['D/E 미기재 보고서 영향', 'debt-equity-disclosure-impact', {}],
    ['WACC Top 5', 'wacc-top-n', { topN: 5 }],
    ['WACC 상위 3', 'wacc-top-n', { topN: 3 }],
    ['최근 평가기관 순위', 'recent-valuator-activity', { topN: 5 }],
    ['최근 회계법인 활동', 'recent-valuator-activity', { topN: 5 }],
    ['바이오 업종 PER 중앙값', 'industry-multiple-median', { metric: 'PER', sector: '바이오' }],
    ['영구현금흐름 비중 분석', 'perpetual-cashflow-ratio', {}],
    ['비영업자산 구성 현황', 'non-operating-asset-composition', {}],
    ['게임 업종 비영업자산 구성', 'non-operating-asset-composition', { sector: '게임' }],
    ['투자 매핑', 'investment-mapping', {}],
    ['섹터별 인수 거래 현황', 'sector-transaction-matrix', {}],
    ['기업가치 대비 비영업자산 비중이 높은 기업', 'noa-ev-ratio', { topN: 10 }],
    ['2024년 IT 섹터 평균 WACC', 'year-sector-average-wacc', { year: 2024, sector: 'IT' }],
    ['2023년 평균 WACC', 'year-sector-average-wacc', { year: 2023 }],
    ['2023년 연도별 통계', 'yearly-key-statistics', { year: 2023 }],
    ['연도별 WACC 추이', 'wacc-trend', {}],
  ])('routes "%s" to %s', (question, kind, params) => {
    expect(router.route(question)).toEqual({ kind, params });
  });

  it('defaults top-N to 10', () => {
    expect(router.route('WACC Top')).toEqual({ kind: 'wacc-top-n', params: { topN: 10 } });
  });

  it('defaults an ambiguous multiple to EV/EBITDA', () => {
    expect(router.route('업종별 EV/EBITDA PBR 중앙값')).toEqual({
      kind: 'industry-multiple-median',
      params: { metric: 'EV/EBITDA' },
    });
  });

  it('applies the first matching rule', () => {
    expect(router.route('IT 섹터 WACC 중앙값 Top 5')?.kind).toBe('industry-wacc-median');
    expect(router.route('평가기관 WACC 중앙값 업종별')?.kind).toBe('industry-wacc-median');
  });

  it('ignores a "g" inside a word', () => {
    expect(router.route('segment WACC Top 3')?.kind).toBe('wacc-top-n');
  });

  it('ignores the "g" of an abbreviation', () => {
    expect(router.route('e.g. WACC top 3')).toEqual({ kind: 'wacc-top-n', params: { topN: 3 } });
  });

  it('needs a year between 2022 and 2025 for the per-year reports', () => {
    expect(router.route('2021년 평균 WACC')).toBeNull();
  });

  it('skips an earlier out-of-range year', () => {
    expect(extractAggregateParams('2021년 대비 2024년 평균 WACC')).toEqual({
      kind: 'year-sector-average-wacc',
      params: { year: 2024 },
    });
    expect(router.route('2020년 대비 2023년 통계')).toEqual({ kind: 'yearly-key-statistics', params: { year: 2023 } });
  });

  it('returns null when no rule applies', () => {
    expect(router.route('회사 소개')).toBeNull();
    expect(router.route('IT 섹터 현황')).toBeNull();
  });

  it('has exactly one rule per aggregate kind, in order', () => {
    expect(AGGREGATE_RULES.map(r => r.kind)).toEqual([...AGGREGATE_KINDS]);
  });

  it('takes a custom rule list', () => {
    const custom = new AggregateAnalysisRouter([
      { kind: 'wacc-trend', matches: () => true, params: () => ({}) },
    ]);
    expect(custom.route('아무 질문')).toEqual({ kind: 'wacc-trend', params: {} });
  });

  it('exposes a stateless shortcut', () => {
    expect(extractAggregateParams('WACC Top 5')).toEqual({ kind: 'wacc-top-n', params: { topN: 5 } });
    expect(extractAggregateParams('회사 소개')).toBeNull();
  });
});
