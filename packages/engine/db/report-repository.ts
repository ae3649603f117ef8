// Report repository: data access for valuation reports
// Implementations: PgReportRepository (postgres) and InMemoryReportRepository (local JSON / tests)

import { readFileSync } from 'node:fs';
import { parseReportRecords } from '../analytics/normalize.js';
import type { DateRange, ValuationReport } from '../types/reports.js';

export interface ReportRepository {
  /** Issuer sector or target business contains the term; newest first */
  searchBySector(term: string): Promise<ValuationReport[]>;
  /** Reports naming peers for a business keyword; newest first */
  searchSimilarCompanies(keyword: string): Promise<ValuationReport[]>;
  /** Sector reports carrying ratios, optionally bounded by issue date; newest first */
  searchFinancialRatios(sector: string, range?: DateRange): Promise<ValuationReport[]>;
  listSectors(): Promise<string[]>;
  loadAll(): Promise<ValuationReport[]>;
}

/** Upstream store failure; never used for "no rows" */
export class DataAccessError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'DataAccessError';
  }
}

function contains(value: string | null | undefined, term: string): boolean {
  return value?.toLowerCase().includes(term.toLowerCase()) ?? false;
}

function newestFirst(a: ValuationReport, b: ValuationReport): number {
  return (b.issueDate ?? '').localeCompare(a.issueDate ?? '');
}

function inRange(report: ValuationReport, range: DateRange): boolean {
  const date = report.issueDate;
  if (range.startDate && (!date || date < range.startDate)) return false;
  if (range.endDate && (!date || date > range.endDate)) return false;
  return true;
}

// In-memory implementation; same filters as the SQL queries
export class InMemoryReportRepository implements ReportRepository {
  private readonly reports: ValuationReport[];

  constructor(reports: readonly ValuationReport[] = []) {
    this.reports = [...reports];
  }

  /** Load a JSON array of stored records (snake_case) */
  static fromFile(path: string): InMemoryReportRepository {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new DataAccessError(`Cannot read report data from ${path}`, 'load', err);
    }
    try {
      return new InMemoryReportRepository(parseReportRecords(data));
    } catch (err) {
      throw new DataAccessError(`Malformed report data in ${path}`, 'load', err);
    }
  }

  async searchBySector(term: string): Promise<ValuationReport[]> {
    return this.reports
      .filter(r => contains(r.issuerSector, term) || contains(r.targetBusiness, term))
      .sort(newestFirst);
  }

  async searchSimilarCompanies(keyword: string): Promise<ValuationReport[]> {
    return this.reports
      .filter(r =>
        (contains(r.targetBusiness, keyword) || contains(r.targetSector, keyword) || contains(r.issuerSector, keyword)) &&
        Boolean(r.similarCompanies?.trim()),
      )
      .sort(newestFirst);
  }

  async searchFinancialRatios(sector: string, range: DateRange = {}): Promise<ValuationReport[]> {
    return this.reports
      .filter(r => (contains(r.issuerSector, sector) || contains(r.targetBusiness, sector)) && inRange(r, range))
      .sort(newestFirst);
  }

  async listSectors(): Promise<string[]> {
    const sectors = new Set<string>();
    for (const r of this.reports) {
      if (r.issuerSector) sectors.add(r.issuerSector);
    }
    return [...sectors].sort();
  }

  async loadAll(): Promise<ValuationReport[]> {
    return [...this.reports];
  }
}
