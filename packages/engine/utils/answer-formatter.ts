// Answer rendering: structured sentences, summaries and markdown tables
// for aggregate outcomes. Output is Korean, matching the disclosure data.

import { summarize } from '../analytics/stats.js';
import type {
  AggregateInsufficient,
  AggregateKind,
  AggregateOutcome,
  AggregateSuccess,
  StatSummary,
} from '../types/analysis.js';
import type { ValuationReport } from '../types/reports.js';

export const DEFAULT_REPORT_TITLE = '주요사항보고서';

export const MESSAGES = {
  noData: '데이터가 없습니다.',
  noSentences: '구조화된 문장을 생성할 수 없습니다.',
  noKeyword: '유사기업 검색 키워드를 찾지 못했습니다. 다른 키워드로 검색해보세요.',
  noSimilarCompanies: (keyword: string) =>
    `'${keyword}'와 관련된 유사기업 데이터를 찾을 수 없습니다.\n다른 키워드로 검색해보세요.`,
  noRatios: (sector: string) => `${sector}업 재무비율 데이터를 찾을 수 없습니다.`,
  noEvSales: 'EV/Sales 값이 있는 데이터가 없습니다.',
  noResults: '관련 데이터를 찾을 수 없습니다.',
  unresolved: '요청하신 분석 유형을 찾을 수 없습니다. 질문을 더 구체적으로 입력해주세요.',
} as const;

const AGGREGATE_TITLES: Record<AggregateKind, string> = {
  'industry-wacc-median': '업종별 WACC 중앙값',
  'valuator-wacc-comparison': '평가기관별 WACC 비교',
  'growth-wacc-violation': '영구성장률(g) ≥ WACC 위반 사례',
  'debt-equity-disclosure-impact': '부채비율(D/E) 미기재에 따른 WACC 차이',
  'wacc-top-n': 'WACC 상위 보고서',
  'recent-valuator-activity': '최근 1년 평가기관 활동',
  'industry-multiple-median': '업종별 멀티플 중앙값',
  'perpetual-cashflow-ratio': '영구현금흐름 비중',
  'non-operating-asset-composition': '비영업자산 구성',
  'investment-mapping': '투자 매핑',
  'sector-transaction-matrix': '섹터 간 거래 매트릭스',
  'noa-ev-ratio': '기업가치 대비 비영업자산 비율',
  'year-sector-average-wacc': '연도·섹터별 평균 WACC',
  'yearly-key-statistics': '연도별 주요 통계',
  'wacc-trend': 'WACC 추이',
};

export function splitPeers(text: string | null | undefined): string[] {
  if (!text) return [];
  return text
    .split(/[,;]/)
    .map(p => p.trim())
    .filter(p => p.length > 0);
}

/**
 * One sentence per report that names peers:
 * "{date}\n{issuer}은 「{title}」에서 {target} 관련 평가 시 유사기업으로 {peers}을 선정했다."
 */
export function generateStructuredSentences(rows: readonly ValuationReport[]): string {
  if (rows.length === 0) return MESSAGES.noData;

  const sentences: string[] = [];
  for (const row of rows) {
    const peers = splitPeers(row.similarCompanies);
    if (peers.length === 0) continue;

    let sentence =
      `${row.issueDate ?? 'N/A'}\n${row.issuerName ?? 'N/A'}은 「${row.reportTitle || DEFAULT_REPORT_TITLE}」에서 ` +
      `${row.targetName ?? 'N/A'} 관련 평가 시 유사기업으로 ${peers.join(', ')}을 선정했다.`;
    const link = row.link?.trim();
    if (link) sentence += `\n\n원문은 여기에서 확인할 수 있다: ${link}`;
    sentences.push(sentence);
  }
  return sentences.join('\n\n');
}

export interface RowSummary {
  rows: number;
  issuers: number;
  targets: number;
}

export function summarizeRows(rows: readonly ValuationReport[]): RowSummary {
  const distinct = (values: Array<string | null | undefined>) =>
    new Set(values.filter((v): v is string => Boolean(v))).size;
  return {
    rows: rows.length,
    issuers: distinct(rows.map(r => r.issuerName)),
    targets: distinct(rows.map(r => r.targetName)),
  };
}

export function formatSummary(summary: RowSummary): string {
  return `총 ${summary.rows}건 (발행기업 ${summary.issuers}곳, 평가대상 ${summary.targets}곳)`;
}

export function evSalesSummary(rows: readonly ValuationReport[]): StatSummary {
  return summarize(rows.flatMap(r => (typeof r.evSales === 'number' ? [r.evSales] : [])));
}

export function formatEvSales(stats: StatSummary): string {
  if (stats.count === 0) return MESSAGES.noEvSales;
  return [
    `EV/Sales 통계 (${stats.count}건)`,
    `- 평균: ${fmtMultiple(stats.mean)}`,
    `- 중앙값: ${fmtMultiple(stats.median)}`,
    `- 최소: ${fmtMultiple(stats.min)}`,
    `- 최대: ${fmtMultiple(stats.max)}`,
  ].join('\n');
}

// ── Tables ──────────────────────────────────────────────────────────

export function markdownTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const lines = [
    `| ${headers.join(' | ')} |`,
    `|${headers.map(() => '---').join('|')}|`,
    ...rows.map(r => `| ${r.join(' | ')} |`),
  ];
  return lines.join('\n');
}

export function fmtPercent(n: number | null | undefined): string {
  return typeof n === 'number' ? `${(n * 100).toFixed(2)}%` : '-';
}

export function fmtMultiple(n: number | null | undefined): string {
  return typeof n === 'number' ? n.toFixed(2) : '-';
}

function reportRow(r: ValuationReport): string[] {
  return [r.issueDate ?? '-', r.issuerName ?? '-', r.targetName ?? '-', r.valuator ?? '-'];
}

function formatInsufficient(outcome: AggregateInsufficient): string {
  return `${AGGREGATE_TITLES[outcome.kind]}: 분석에 필요한 데이터가 없습니다 (${outcome.missingFields.join(', ')})`;
}

function formatSuccess(outcome: AggregateSuccess): string {
  switch (outcome.kind) {
    case 'industry-wacc-median':
      return markdownTable(
        ['섹터', 'WACC 중앙값', '건수'],
        outcome.data.map(s => [s.sector, fmtPercent(s.median), String(s.count)]),
      );
    case 'valuator-wacc-comparison':
      return markdownTable(
        ['평가기관', '건수', '평균', '중앙값'],
        outcome.data.map(v => [v.valuator, String(v.count), fmtPercent(v.mean), fmtPercent(v.median)]),
      );
    case 'growth-wacc-violation': {
      const { violations, checked, violationRate } = outcome.data;
      const head = `검토 ${checked}건 중 ${violations.length}건 위반 (${fmtPercent(violationRate)})`;
      if (violations.length === 0) return head;
      return `${head}\n\n${markdownTable(
        ['발행일', '발행기업', '평가대상', '평가기관', 'g', 'WACC'],
        violations.map(r => [...reportRow(r), fmtPercent(r.growthRate), fmtPercent(r.wacc)]),
      )}`;
    }
    case 'debt-equity-disclosure-impact': {
      const d = outcome.data;
      return markdownTable(
        ['구분', '건수', '평균 WACC'],
        [
          ['D/E 기재', String(d.disclosedCount), fmtPercent(d.disclosedMeanWacc)],
          ['D/E 미기재', String(d.undisclosedCount), fmtPercent(d.undisclosedMeanWacc)],
          ['차이', '-', fmtPercent(d.delta)],
        ],
      );
    }
    case 'wacc-top-n':
      return markdownTable(
        ['순위', '발행일', '발행기업', '평가대상', '평가기관', 'WACC'],
        outcome.data.reports.map((r, i) => [String(i + 1), ...reportRow(r), fmtPercent(r.wacc)]),
      );
    case 'recent-valuator-activity': {
      const { windowStart, windowEnd, ranking } = outcome.data;
      return `기간: ${windowStart} ~ ${windowEnd}\n\n${markdownTable(
        ['평가기관', '건수'],
        ranking.map(v => [v.valuator, String(v.count)]),
      )}`;
    }
    case 'industry-multiple-median': {
      const { metric, sector, bySector } = outcome.data;
      const scope = sector ? ` (${sector})` : '';
      return `${metric}${scope}\n\n${markdownTable(
        ['섹터', `${metric} 중앙값`, '건수'],
        bySector.map(s => [s.sector, fmtMultiple(s.median), String(s.count)]),
      )}`;
    }
    case 'perpetual-cashflow-ratio': {
      const { checked, highRatio, bySector, distribution } = outcome.data;
      return [
        `검토 ${checked}건 중 영구현금흐름 비중 50% 이상 ${highRatio.length}건`,
        markdownTable(
          ['발행일', '발행기업', '평가대상', '평가기관', '비중'],
          highRatio.map(r => [...reportRow(r.report), fmtPercent(r.ratio)]),
        ),
        markdownTable(['섹터', '평균 비중', '건수'], bySector.map(s => [s.sector, fmtPercent(s.meanRatio), String(s.count)])),
        markdownTable(['구간', '건수'], distribution.map(b => [b.bucket, String(b.count)])),
      ].join('\n\n');
    }
    case 'non-operating-asset-composition': {
      const { overall, bySector } = outcome.data;
      const sections = [markdownTable(['항목', '빈도'], overall.map(c => [c.item, String(c.count)]))];
      for (const { sector, items } of bySector) {
        sections.push(`${sector}\n\n${markdownTable(['항목', '빈도'], items.map(c => [c.item, String(c.count)]))}`);
      }
      return sections.join('\n\n');
    }
    case 'investment-mapping': {
      const { totalReports, issuers, portfolio } = outcome.data;
      const sections = [
        `투자 관련 보고서 ${totalReports}건`,
        markdownTable(['발행기업', '건수', '투자대상'], issuers.map(i => [i.issuer, String(i.count), i.targets.join(', ')])),
      ];
      if (portfolio) {
        sections.push(`${portfolio.issuer} 포트폴리오\n\n${markdownTable(
          ['발행일', '발행기업', '평가대상', '평가기관'],
          portfolio.holdings.map(reportRow),
        )}`);
      }
      return sections.join('\n\n');
    }
    case 'sector-transaction-matrix': {
      const { issuerSectors, targetSectors, counts, byPurpose } = outcome.data;
      return [
        markdownTable(
          ['발행 섹터 \\ 대상 섹터', ...targetSectors],
          issuerSectors.map((s, i) => [s, ...counts[i].map(String)]),
        ),
        markdownTable(['보고서 목적', '건수'], byPurpose.map(p => [p.purpose, String(p.count)])),
      ].join('\n\n');
    }
    case 'noa-ev-ratio':
      return [
        markdownTable(
          ['발행일', '발행기업', '평가대상', '평가기관', 'NOA/EV'],
          outcome.data.top.map(r => [...reportRow(r.report), fmtPercent(r.ratio)]),
        ),
        markdownTable(
          ['섹터', '평균 NOA/EV', '건수'],
          outcome.data.bySector.map(s => [s.sector, fmtPercent(s.meanRatio), String(s.count)]),
        ),
      ].join('\n\n');
    case 'year-sector-average-wacc': {
      const { year, sector, summary } = outcome.data;
      return markdownTable(
        ['연도', '섹터', '건수', '평균', '중앙값', '표준편차'],
        [[
          String(year), sector ?? '전체', String(summary.count),
          fmtPercent(summary.mean), fmtPercent(summary.median), fmtPercent(summary.stdDev),
        ]],
      );
    }
    case 'yearly-key-statistics': {
      const s = outcome.data;
      return [
        markdownTable(
          ['항목', '값'],
          [
            ['보고서 수', String(s.rowCount)],
            ['발행기업 수', String(s.uniqueIssuers)],
            ['평가대상 수', String(s.uniqueTargets)],
            ['평가기관 수', String(s.uniqueValuators)],
            ['WACC 평균', fmtPercent(s.wacc.mean)],
            ['WACC 중앙값', fmtPercent(s.wacc.median)],
          ],
        ),
        markdownTable(['섹터', '건수'], s.sectorDistribution.map(c => [c.item, String(c.count)])),
        markdownTable(['멀티플', '중앙값', '건수'], s.multipleMedians.map(m => [m.metric, fmtMultiple(m.median), String(m.count)])),
        markdownTable(['평가기관', '건수'], s.topValuators.map(c => [c.item, String(c.count)])),
        markdownTable(['월', '발행 건수'], s.monthlyIssuance.map(m => [m.month, String(m.count)])),
      ].join('\n\n');
    }
    case 'wacc-trend': {
      const { years, sectors, cells } = outcome.data;
      return markdownTable(
        ['연도', ...sectors],
        years.map((year, i) => [
          String(year),
          ...cells[i].map(c => (c.count > 0 ? `${fmtPercent(c.mean)} / ${fmtPercent(c.median)} (${c.count})` : '-')),
        ]),
      );
    }
  }
}

export function formatAggregate(outcome: AggregateOutcome): string {
  if (outcome.status === 'insufficient_data') return formatInsufficient(outcome);
  return `## ${AGGREGATE_TITLES[outcome.kind]}\n\n${formatSuccess(outcome)}`;
}
