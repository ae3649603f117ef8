// Normalization of stored report records into ValuationReport rows.
// Every statistic runs on normalized values: "17.78%" is 0.1778, "1,234" is 1234,
// and anything unparsable is null.

import { z } from 'zod';
import type { RawReportRecord, ValuationReport } from '../types/reports.js';

const NULL_TOKENS = new Set(['', '-', 'n/a', 'na', 'nan', 'null', 'none']);

const TRAILING_UNIT_RE = /(?:x|배)$/i;
const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const DATE_RE = /^(\d{4})[-./]?(\d{1,2})[-./]?(\d{1,2})/;

/**
 * Parse a ratio, percentage or amount. A trailing `%` divides by 100;
 * thousands separators and a trailing multiple unit (`x`, `배`) are dropped.
 */
export function parseNumeric(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  let text = value.trim();
  if (NULL_TOKENS.has(text.toLowerCase())) return null;

  const percent = text.endsWith('%');
  if (percent) text = text.slice(0, -1).trim();
  text = text.replace(/,/g, '').replace(TRAILING_UNIT_RE, '').trim();
  if (text.length === 0) return null;

  if (!DECIMAL_RE.test(text)) return null;
  const n = Number(text);
  if (!Number.isFinite(n)) return null;
  return percent ? n / 100 : n;
}

/** `YYYY-MM-DD` from "2024-03-15", "2024.3.15", "20240315" or a timestamp; else null */
export function normalizeDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const match = DATE_RE.exec(value.trim());
  if (!match) return null;

  const [, y, m, d] = match;
  const month = Number(m);
  const day = Number(d);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return `${y}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function normalizeText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = value.trim();
  return NULL_TOKENS.has(text.toLowerCase()) ? null : text;
}

const text = z.string().nullable().optional();
const numeric = z.union([z.string(), z.number()]).nullable().optional();

export const RawReportRecordSchema = z.object({
  report_title: text,
  issue_date: text,
  issuer_name: text,
  issuer_sector: text,
  target_name: text,
  target_sector: text,
  target_business: text,
  similar_companies: text,
  valuator: text,
  report_purpose: text,
  wacc: numeric,
  ke: numeric,
  kd: numeric,
  growth_rate: numeric,
  debt_to_equity: numeric,
  ev_sales: numeric,
  ev_ebitda: numeric,
  psr: numeric,
  per: numeric,
  pbr: numeric,
  pv_fraction: numeric,
  non_operating_assets: numeric,
  enterprise_value: numeric,
  noa_composition: text,
  link: text,
});

export function normalizeReport(raw: RawReportRecord): ValuationReport {
  return {
    reportTitle: normalizeText(raw.report_title),
    issueDate: normalizeDate(raw.issue_date),
    issuerName: normalizeText(raw.issuer_name),
    issuerSector: normalizeText(raw.issuer_sector),
    targetName: normalizeText(raw.target_name),
    targetSector: normalizeText(raw.target_sector),
    targetBusiness: normalizeText(raw.target_business),
    similarCompanies: normalizeText(raw.similar_companies),
    valuator: normalizeText(raw.valuator),
    reportPurpose: normalizeText(raw.report_purpose),
    wacc: parseNumeric(raw.wacc),
    ke: parseNumeric(raw.ke),
    kd: parseNumeric(raw.kd),
    growthRate: parseNumeric(raw.growth_rate),
    debtToEquity: parseNumeric(raw.debt_to_equity),
    evSales: parseNumeric(raw.ev_sales),
    evEbitda: parseNumeric(raw.ev_ebitda),
    psr: parseNumeric(raw.psr),
    per: parseNumeric(raw.per),
    pbr: parseNumeric(raw.pbr),
    pvFraction: parseNumeric(raw.pv_fraction),
    nonOperatingAssets: parseNumeric(raw.non_operating_assets),
    enterpriseValue: parseNumeric(raw.enterprise_value),
    noaComposition: normalizeText(raw.noa_composition),
    link: normalizeText(raw.link),
  };
}

/** Validate an array of stored records (e.g. a local JSON export) and normalize each */
export function parseReportRecords(data: unknown): ValuationReport[] {
  return z.array(RawReportRecordSchema).parse(data).map(normalizeReport);
}
