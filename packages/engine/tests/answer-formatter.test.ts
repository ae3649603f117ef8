import { describe, it, expect } from 'vitest';
import { runAggregate } from '../analytics/run-aggregate.js';
import type { ValuationReport } from '../types/reports.js';
import {
  MESSAGES,
  evSalesSummary,
  fmtMultiple,
  fmtPercent,
  formatAggregate,
  formatEvSales,
  formatSummary,
  generateStructuredSentences,
  markdownTable,
  splitPeers,
  summarizeRows,
} from '../utils/answer-formatter.js';
import { ConversationLog } from '../utils/conversation-log.js';

const peerReport: ValuationReport = {
  issueDate: '2024-11-20',
  issuerName: '테스트소프트',
  reportTitle: null,
  targetName: '테스트클라우드',
  similarCompanies: '알파소프트; 베타클라우드',
  link: 'https://example.invalid/reports/1',
};

describe('generateStructuredSentences', () => {
  it('writes one sentence per report that names peers', () => {
    expect(generateStructuredSentences([peerReport])).toBe(
      '2024-11-20\n테스트소프트은 「주요사항보고서」에서 테스트클라우드 관련 평가 시 유사기업으로 ' +
        '알파소프트, 베타클라우드을 선정했다.\n\n원문은 여기에서 확인할 수 있다: https://example.invalid/reports/1',
    );
  });

  it('fills missing fields with N/A and omits an empty link', () => {
    expect(generateStructuredSentences([{ reportTitle: '투자결정', similarCompanies: '감마', link: ' ' }])).toBe(
      'N/A\nN/A은 「투자결정」에서 N/A 관련 평가 시 유사기업으로 감마을 선정했다.',
    );
  });

  it('skips reports without peers', () => {
    expect(generateStructuredSentences([{ issuerName: 'X', similarCompanies: ' , ' }])).toBe('');
    expect(generateStructuredSentences([])).toBe(MESSAGES.noData);
  });

  it('splits peer lists on commas and semicolons', () => {
    expect(splitPeers('A, B;C ,')).toEqual(['A', 'B', 'C']);
    expect(splitPeers(null)).toEqual([]);
  });
});

describe('summaries', () => {
  const rows: ValuationReport[] = [
    { issuerName: 'X', targetName: 'T1', evSales: 2 },
    { issuerName: 'X', targetName: 'T2', evSales: 4 },
    { issuerName: 'Y', targetName: null },
  ];

  it('counts rows, issuers and targets', () => {
    expect(formatSummary(summarizeRows(rows))).toBe('총 3건 (발행기업 2곳, 평가대상 2곳)');
  });

  it('formats EV/Sales statistics', () => {
    expect(formatEvSales(evSalesSummary(rows))).toBe(
      'EV/Sales 통계 (2건)\n- 평균: 3.00\n- 중앙값: 3.00\n- 최소: 2.00\n- 최대: 4.00',
    );
    expect(formatEvSales(evSalesSummary([]))).toBe(MESSAGES.noEvSales);
  });

  it('formats numbers', () => {
    expect(fmtPercent(0.1235)).toBe('12.35%');
    expect(fmtPercent(null)).toBe('-');
    expect(fmtMultiple(3.5)).toBe('3.50');
  });

  it('renders markdown tables', () => {
    expect(markdownTable(['a', 'b'], [['1', '2']])).toBe('| a | b |\n|---|---|\n| 1 | 2 |');
  });
});

describe('formatAggregate', () => {
  it('explains missing data', () => {
    const outcome = runAggregate('growth-wacc-violation', {}, []);
    expect(formatAggregate(outcome)).toBe(
      '영구성장률(g) ≥ WACC 위반 사례: 분석에 필요한 데이터가 없습니다 (growthRate, wacc)',
    );
  });

  it('renders a titled table', () => {
    const outcome = runAggregate('industry-wacc-median', { metric: 'WACC' }, [
      { issuerSector: 'IT', wacc: 0.125 },
    ]);
    expect(formatAggregate(outcome)).toBe(
      '## 업종별 WACC 중앙값\n\n| 섹터 | WACC 중앙값 | 건수 |\n|---|---|---|\n| IT | 12.50% | 1 |',
    );
  });

  it('states the violation rate before the table', () => {
    const outcome = runAggregate('growth-wacc-violation', {}, [{ growthRate: 0.01, wacc: 0.1 }]);
    expect(formatAggregate(outcome)).toBe('## 영구성장률(g) ≥ WACC 위반 사례\n\n검토 1건 중 0건 위반 (0.00%)');
  });
});

describe('ConversationLog', () => {
  it('appends entries in order', () => {
    const log = new ConversationLog();
    const at = new Date('2025-01-01T00:00:00Z');
    log.append({ question: 'q1', answer: 'a1', intent: 'unresolved_aggregate', rowCount: 0 }, at);
    log.append({ question: 'q2', answer: 'a2', intent: 'financial_ratio', rowCount: 3 });

    expect(log.size).toBe(2);
    expect(log.list().map(e => e.question)).toEqual(['q1', 'q2']);
    expect(log.list()[0].timestamp).toBe(at);
    expect(log.latest().map(e => e.question)).toEqual(['q2']);
  });

  it('hands out copies of its history', () => {
    const log = new ConversationLog();
    log.append({ question: 'q', answer: 'a', intent: 'similar_company', rowCount: 1 });
    const snapshot = log.list();
    log.append({ question: 'q2', answer: 'a2', intent: 'similar_company', rowCount: 1 });
    expect(snapshot).toHaveLength(1);
  });
});
