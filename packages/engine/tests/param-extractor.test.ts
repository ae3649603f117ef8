import { describe, it, expect } from 'vitest';
import {
  extractMultiple,
  extractSector,
  extractStartDate,
  extractTopN,
  extractReportYear,
  extractYear,
  findMultiples,
  isReportYear,
} from '../routing/param-extractor.js';
import { containsTerm, firstTermIn } from '../routing/vocabulary.js';

describe('containsTerm', () => {
  it('does not find an ASCII term glued to other letters', () => {
    expect(containsTerm('deals with banks', 'IT')).toBe(false);
    expect(containsTerm('stop', 'top')).toBe(false);
  });

  it('finds an ASCII term next to Hangul or digits', () => {
    expect(containsTerm('IT업종', 'IT')).toBe(true);
    expect(containsTerm('top5 WACC', 'top')).toBe(true);
  });

  it('matches Korean terms as plain substrings', () => {
    expect(containsTerm('금융업 기업들', '금융')).toBe(true);
  });

  it('returns the first listed term found', () => {
    expect(firstTermIn('보안 게임', ['게임', '보안'])).toBe('게임');
    expect(firstTermIn('없음', ['게임'])).toBeNull();
  });
});

describe('param extraction', () => {
  it('reads a standalone 202x year', () => {
    expect(extractYear('2024년 WACC')).toBe(2024);
    expect(extractYear('FY20245')).toBeNull();
    expect(extractYear('in 2019')).toBeNull();
  });

  it('limits report years to 2022-2025', () => {
    expect(isReportYear(2021)).toBe(false);
    expect(isReportYear(2022)).toBe(true);
    expect(isReportYear(2025)).toBe(true);
    expect(isReportYear(2026)).toBe(false);
    expect(isReportYear(null)).toBe(false);
  });

  it('takes the first year inside the report range', () => {
    expect(extractReportYear('2021년 대비 2024년')).toBe(2024);
    expect(extractReportYear('2023 vs 2024')).toBe(2023);
    expect(extractReportYear('2021년과 2026년')).toBeNull();
    expect(extractReportYear('WACC')).toBeNull();
  });

  it('picks the first sector in vocabulary order', () => {
    expect(extractSector('IT 섹터 WACC 중앙값')).toBe('IT');
    expect(extractSector('바이오 업종')).toBe('바이오');
    expect(extractSector('deals with banks')).toBeNull();
  });

  it('reads top-N with a default of 10', () => {
    expect(extractTopN('WACC Top 5')).toBe(5);
    expect(extractTopN('WACC Top')).toBe(10);
    expect(extractTopN('상위 3개')).toBe(3);
    expect(extractTopN('top5')).toBe(5);
  });

  it('reads a single multiple and defaults otherwise', () => {
    expect(extractMultiple('PER 중앙값')).toBe('PER');
    expect(extractMultiple('ev / ebitda')).toBe('EV/EBITDA');
    expect(findMultiples('EV/Sales 와 PBR')).toEqual(['EV/Sales', 'PBR']);
    expect(extractMultiple('EV/Sales 와 PBR')).toBe('EV/EBITDA');
    expect(extractMultiple('perpetual')).toBe('EV/EBITDA');
  });

  it('reads a start year from the first matching phrase', () => {
    expect(extractStartDate('금융업 EV/Sales 2022년 이후')).toBe('2022-01-01');
    expect(extractStartDate('EV/Sales since 2021')).toBe('2021-01-01');
    expect(extractStartDate('2021년 매출 2023년 이후')).toBe('2023-01-01');
    expect(extractStartDate('EV/Sales')).toBeNull();
  });
});
