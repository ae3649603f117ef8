import { describe, it, expect } from 'vitest';
import { KeywordCatalog } from '../config/keyword-catalog.js';
import { SimilarCompanyKeywordResolver } from '../matching/similar-company-resolver.js';
import { SmartSearchResolver } from '../matching/smart-search.js';
import { INTENT_RULES, IntentClassifier } from '../routing/intent-classifier.js';

type ClassifierOptions = ConstructorParameters<typeof IntentClassifier>[1];

function makeClassifier(catalog = KeywordCatalog.empty(), options: ClassifierOptions = {}): IntentClassifier {
  return new IntentClassifier(new SimilarCompanyKeywordResolver(new SmartSearchResolver(catalog)), options);
}

describe('IntentClassifier', () => {
  const classifier = makeClassifier(KeywordCatalog.fromDefinitions({ game: ['게임'] }));

  it('classifies similar-company questions with the resolved keyword', () => {
    const intent = classifier.classify('게임 업계 유사기업');
    expect(intent.type).toBe('similar_company');
    if (intent.type === 'similar_company') {
      expect(intent.keyword).toBe('게임');
      expect(intent.source).toBe('smart_search');
    }
  });

  it('recognizes English similar-company terms', () => {
    expect(classifier.classify('similar companies in 게임').type).toBe('similar_company');
  });

  it('lets a similar-company term win over WACC', () => {
    const intent = makeClassifier().classify('유사기업 WACC 질문과 같은 혼합 질의');
    expect(intent.type).toBe('similar_company');
    if (intent.type === 'similar_company') expect(intent.source).toBe('fallback');
  });

  it('routes analytical questions to an aggregate', () => {
    expect(classifier.classify('IT 섹터 WACC 중앙값')).toEqual({
      type: 'aggregate_report',
      kind: 'industry-wacc-median',
      params: { metric: 'WACC' },
    });
  });

  it('marks analytical questions no rule handles as unresolved', () => {
    expect(classifier.classify('섹터 현황')).toEqual({ type: 'unresolved_aggregate' });
  });

  it('reads the sector and start date of a ratio question', () => {
    expect(classifier.classify('금융업 기업들의 EV/Sales')).toEqual({
      type: 'financial_ratio',
      sector: '금융',
      sectorDefaulted: false,
      startDate: null,
    });
  });

  it('defaults the ratio sector', () => {
    expect(classifier.classify('EV/Sales 2022년 이후')).toEqual({
      type: 'financial_ratio',
      sector: '금융',
      sectorDefaulted: true,
      startDate: '2022-01-01',
    });
    expect(makeClassifier(KeywordCatalog.empty(), { defaultRatioSector: '제조' }).classify('EV/Sales')).toEqual({
      type: 'financial_ratio',
      sector: '제조',
      sectorDefaulted: true,
      startDate: null,
    });
  });

  it('treats everything else as a sector search on the trimmed question', () => {
    expect(classifier.classify('  반도체 장비 회사 ')).toEqual({
      type: 'generic_sector_search',
      sector: '반도체 장비 회사',
    });
  });

  it('names the rule that handles a question', () => {
    expect(classifier.ruleFor('IT 섹터 WACC 중앙값')).toBe('aggregate-analysis');
    expect(classifier.ruleFor('EV/Sales')).toBe('financial-ratio');
    expect(INTENT_RULES.map(r => r.name)).toEqual([
      'similar-company',
      'aggregate-analysis',
      'financial-ratio',
      'generic-sector-search',
    ]);
  });

  it('follows a custom rule order', () => {
    const ratioFirst = makeClassifier(KeywordCatalog.empty(), {
      rules: [INTENT_RULES[2], INTENT_RULES[0], INTENT_RULES[3]],
    });
    expect(ratioFirst.classify('유사기업 EV/Sales').type).toBe('financial_ratio');
  });
});
