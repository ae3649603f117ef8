// Question vocabulary for intent and aggregate routing
// Korean terms as they appear in disclosure questions, with English equivalents

const ASCII_TERM_RE = /^[\x20-\x7e]+$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const asciiPatterns = new Map<string, RegExp>();

/**
 * Case-insensitive term containment.
 * ASCII terms must not be glued to other ASCII letters ("it" is not found in
 * "with", but is in "IT업종"); other terms are plain substrings.
 */
export function containsTerm(text: string, term: string): boolean {
  if (!ASCII_TERM_RE.test(term)) {
    return text.toLowerCase().includes(term.toLowerCase());
  }
  let pattern = asciiPatterns.get(term);
  if (!pattern) {
    pattern = new RegExp(`(?<![A-Za-z])${escapeRegExp(term)}(?![A-Za-z])`, 'i');
    asciiPatterns.set(term, pattern);
  }
  return pattern.test(text);
}

export function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some(term => containsTerm(text, term));
}

export function firstTermIn(text: string, terms: readonly string[]): string | null {
  return terms.find(term => containsTerm(text, term)) ?? null;
}

export const SIMILAR_COMPANY_TERMS = ['유사기업', '유사', 'similar company', 'similar companies', 'peer', 'peers'];

export const FINANCIAL_RATIO_TERMS = ['EV/Sales', '재무비율', 'financial ratio', 'financial ratios'];

export const SECTOR_TERMS = ['섹터', '업종', 'sector', 'sectors', 'industry', 'industries'];
export const MEDIAN_TERMS = ['중앙값', '중간값', 'median'];
export const WACC_TERMS = ['WACC'];
export const VALUATOR_TERMS = ['평가기관', '외부평가기관', 'valuator', 'valuators', 'valuation firm', 'valuation firms'];
export const COMPARE_TERMS = ['비교', 'compare', 'comparison'];
export const VIOLATION_TERMS = ['위반', 'violation', 'violations'];
export const NON_DISCLOSURE_TERMS = ['미기재', '미공시', 'non-disclosure', 'undisclosed', 'not disclosed'];
export const DEBT_EQUITY_TERMS = ['D/E', '부채비율', 'debt-ratio', 'debt ratio', 'debt-to-equity'];
export const TOP_TERMS = ['top', '상위'];
export const RECENT_TERMS = ['최근', 'recent', 'latest'];
export const ACCOUNTING_FIRM_TERMS = ['회계법인', 'accounting firm', 'accounting firms'];
export const PERPETUAL_CASHFLOW_TERMS = ['영구현금흐름', 'perpetual cash flow', 'perpetual cashflow', 'perpetual-cashflow'];
export const RATIO_TERMS = ['비중', '비율', 'ratio', 'share'];
export const NOA_COMPOSITION_TERMS = [
  '비영업자산구성', '비영업자산 구성', 'non-operating-asset-composition', 'non-operating asset composition',
];
export const NOA_TERMS = ['비영업자산', 'non-operating-asset', 'non-operating asset', 'non-operating assets'];
export const COMPOSITION_TERMS = ['구성', 'composition'];
export const INVESTMENT_TERMS = ['투자', 'investment', 'investments'];
export const MAPPING_TERMS = ['매핑', 'mapping'];
export const TRANSACTION_TERMS = [
  '인수', '양수', '처분', '양도', '거래',
  'acquisition', 'acquisitions', 'disposal', 'disposals', 'transaction', 'transactions',
];
export const ENTERPRISE_VALUE_TERMS = ['기업가치', 'enterprise value'];
export const HIGH_TERMS = ['높은', '높', 'high', 'higher', 'highest'];
export const AVERAGE_TERMS = ['평균', 'average', 'mean'];
export const YEARLY_STATISTICS_TERMS = ['연도별통계', '연도별 통계', 'yearly-statistics', 'yearly statistics'];
export const STATISTICS_TERMS = ['통계', 'statistics'];
export const TREND_TERMS = ['추이', '트렌드', 'trend', 'trends'];
export const YEARLY_TERMS = ['연도별', '연도', '년도별', 'yearly', 'by year', 'annual'];

/** Any of these sends a question down the aggregate-analysis path */
export const ANALYTICAL_TERMS = [
  ...SECTOR_TERMS,
  ...MEDIAN_TERMS,
  ...WACC_TERMS,
  ...VALUATOR_TERMS,
  ...VIOLATION_TERMS,
  ...NON_DISCLOSURE_TERMS,
  ...TOP_TERMS,
  ...RECENT_TERMS,
  ...PERPETUAL_CASHFLOW_TERMS,
  ...NOA_COMPOSITION_TERMS,
  ...NOA_TERMS,
  '산업', '거래', 'transaction', 'transactions',
  ...INVESTMENT_TERMS,
  ...MAPPING_TERMS,
  ...YEARLY_STATISTICS_TERMS,
  ...STATISTICS_TERMS,
  ...TREND_TERMS,
];
