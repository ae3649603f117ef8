// Parameter extraction from question text: year, sector, top-N, multiple, start date

import { VOCABULARY } from '../config/vocabulary.js';
import type { MultipleName } from '../types/analysis.js';
import { firstTermIn } from './vocabulary.js';

export const DEFAULT_TOP_N = 10;
export const DEFAULT_MULTIPLE: MultipleName = 'EV/EBITDA';

/** Years a question may name for the per-year reports */
export const REPORT_YEAR_RANGE = { min: 2022, max: 2025 } as const;

const YEAR_RE = /(?<!\d)(202\d)(?!\d)/;
const YEAR_ALL_RE = /(?<!\d)(202\d)(?!\d)/g;
const TOP_N_RE = /(?:top|상위)\s*(\d+)/i;

const MULTIPLE_PATTERNS: ReadonlyArray<[MultipleName, RegExp]> = [
  ['EV/EBITDA', /ev\s*\/\s*ebitda/i],
  ['EV/Sales', /ev\s*\/\s*sales/i],
  ['PSR', /(?<![A-Za-z])psr(?![A-Za-z])/i],
  ['PER', /(?<![A-Za-z])per(?![A-Za-z])/i],
  ['PBR', /(?<![A-Za-z])pbr(?![A-Za-z])/i],
];

/** Ordered: the first pattern that matches gives the start year */
const START_YEAR_PATTERNS: readonly RegExp[] = [
  /(\d{4})년\s*이후/,
  /(\d{4})년\s*부터/,
  /(\d{4})\s*이후/,
  /(\d{4})\s*부터/,
  /since\s+(\d{4})/i,
  /from\s+(\d{4})/i,
  /after\s+(\d{4})/i,
  /(\d{4})년/,
];

/** First 4-digit year token in 2020–2029, or null */
export function extractYear(question: string): number | null {
  const match = YEAR_RE.exec(question);
  return match ? Number(match[1]) : null;
}

export function isReportYear(year: number | null): year is number {
  return year !== null && year >= REPORT_YEAR_RANGE.min && year <= REPORT_YEAR_RANGE.max;
}

/** First year token inside REPORT_YEAR_RANGE, skipping earlier out-of-range years */
export function extractReportYear(question: string): number | null {
  for (const match of question.matchAll(YEAR_ALL_RE)) {
    const year = Number(match[1]);
    if (isReportYear(year)) return year;
  }
  return null;
}

/** First sector keyword named in the question, in list order */
export function extractSector(
  question: string,
  sectors: readonly string[] = VOCABULARY.sectorKeywords,
): string | null {
  return firstTermIn(question, sectors);
}

export function extractTopN(question: string, fallback = DEFAULT_TOP_N): number {
  const match = TOP_N_RE.exec(question);
  if (!match) return fallback;
  const n = Number(match[1]);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function findMultiples(question: string): MultipleName[] {
  return MULTIPLE_PATTERNS.filter(([, re]) => re.test(question)).map(([name]) => name);
}

/** The single multiple named in the question; EV/EBITDA when none or several are */
export function extractMultiple(question: string): MultipleName {
  const found = findMultiples(question);
  return found.length === 1 ? found[0] : DEFAULT_MULTIPLE;
}

/** `YYYY-01-01` for "2022년 이후"-style phrases, or null */
export function extractStartDate(question: string): string | null {
  for (const pattern of START_YEAR_PATTERNS) {
    const match = pattern.exec(question);
    if (match) return `${match[1]}-01-01`;
  }
  return null;
}
