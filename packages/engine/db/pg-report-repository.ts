// PgReportRepository: PostgreSQL-backed ReportRepository over valuation_reports
// NUMERIC columns arrive as strings and go through the same normalization as local data

import { normalizeReport } from '../analytics/normalize.js';
import type { DateRange, RawReportRecord, ValuationReport } from '../types/reports.js';
import { queryWithRetry } from './pg-client.js';
import { DataAccessError } from './report-repository.js';
import type { ReportRepository } from './report-repository.js';

const REPORT_COLUMNS = `
  report_title, to_char(issue_date, 'YYYY-MM-DD') AS issue_date,
  issuer_name, issuer_sector, target_name, target_sector, target_business,
  similar_companies, valuator, report_purpose,
  wacc, ke, kd, growth_rate, debt_to_equity,
  ev_sales, ev_ebitda, psr, per, pbr,
  pv_fraction, non_operating_assets, enterprise_value, noa_composition, link`;

const SECTOR_MATCH = `(issuer_sector ILIKE $1 OR target_business ILIKE $1)`;

type ReportRow = RawReportRecord & { [column: string]: unknown };

export class PgReportRepository implements ReportRepository {
  constructor(private readonly table = 'valuation_reports') {}

  private async select(operation: string, where: string, params: unknown[]): Promise<ValuationReport[]> {
    const sql = `SELECT ${REPORT_COLUMNS} FROM ${this.table} ${where}`;
    try {
      const { rows } = await queryWithRetry<ReportRow>(sql, params);
      return rows.map(normalizeReport);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new DataAccessError(`${operation} failed: ${msg}`, operation, err);
    }
  }

  async searchBySector(term: string): Promise<ValuationReport[]> {
    return this.select(
      'searchBySector',
      `WHERE ${SECTOR_MATCH} ORDER BY issue_date DESC NULLS LAST`,
      [`%${term}%`],
    );
  }

  async searchSimilarCompanies(keyword: string): Promise<ValuationReport[]> {
    return this.select(
      'searchSimilarCompanies',
      `WHERE (target_business ILIKE $1 OR target_sector ILIKE $1 OR issuer_sector ILIKE $1)
         AND similar_companies IS NOT NULL AND btrim(similar_companies) <> ''
       ORDER BY issue_date DESC NULLS LAST`,
      [`%${keyword}%`],
    );
  }

  async searchFinancialRatios(sector: string, range: DateRange = {}): Promise<ValuationReport[]> {
    const params: unknown[] = [`%${sector}%`];
    const clauses = [SECTOR_MATCH];
    if (range.startDate) {
      params.push(range.startDate);
      clauses.push(`issue_date >= $${params.length}`);
    }
    if (range.endDate) {
      params.push(range.endDate);
      clauses.push(`issue_date <= $${params.length}`);
    }
    return this.select(
      'searchFinancialRatios',
      `WHERE ${clauses.join(' AND ')} ORDER BY issue_date DESC NULLS LAST`,
      params,
    );
  }

  async listSectors(): Promise<string[]> {
    try {
      const { rows } = await queryWithRetry<{ issuer_sector: string }>(
        `SELECT DISTINCT issuer_sector FROM ${this.table}
         WHERE issuer_sector IS NOT NULL AND btrim(issuer_sector) <> ''
         ORDER BY issuer_sector`,
        [],
      );
      return rows.map(r => r.issuer_sector);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new DataAccessError(`listSectors failed: ${msg}`, 'listSectors', err);
    }
  }

  async loadAll(): Promise<ValuationReport[]> {
    return this.select('loadAll', 'ORDER BY issue_date DESC NULLS LAST', []);
  }
}
