import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DataAccessError } from '../db/report-repository.js';

const mockQuery = vi.fn();

vi.mock('../db/pg-client.js', () => ({
  queryWithRetry: mockQuery,
}));

describe('PgReportRepository', () => {
  let repo: InstanceType<typeof import('../db/pg-report-repository.js').PgReportRepository>;

  beforeEach(async () => {
    vi.clearAllMocks();
    const { PgReportRepository } = await import('../db/pg-report-repository.js');
    repo = new PgReportRepository();
  });

  it('searches sectors with ILIKE and normalizes NUMERIC strings', async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [{ issue_date: '2024-11-20', issuer_sector: 'IT', wacc: '0.1235', ev_sales: '2.50' }],
    });

    const rows = await repo.searchBySector('IT');

    expect(rows[0].issueDate).toBe('2024-11-20');
    expect(rows[0].wacc).toBe(0.1235);
    expect(rows[0].evSales).toBe(2.5);
    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('FROM valuation_reports');
    expect(sql).toContain('issuer_sector ILIKE $1 OR target_business ILIKE $1');
    expect(sql).toContain('ORDER BY issue_date DESC NULLS LAST');
    expect(params).toEqual(['%IT%']);
  });

  it('requires peers for similar-company searches', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await repo.searchSimilarCompanies('게임');

    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('similar_companies IS NOT NULL');
    expect(params).toEqual(['%게임%']);
  });

  it('adds date bounds as positional parameters', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await repo.searchFinancialRatios('금융', { startDate: '2022-01-01', endDate: '2024-12-31' });

    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('issue_date >= $2');
    expect(sql).toContain('issue_date <= $3');
    expect(params).toEqual(['%금융%', '2022-01-01', '2024-12-31']);
  });

  it('omits date clauses when no range is given', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await repo.searchFinancialRatios('금융');

    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).not.toContain('$2');
    expect(params).toEqual(['%금융%']);
  });

  it('lists distinct issuer sectors', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ issuer_sector: 'IT' }, { issuer_sector: '금융' }] });
    expect(await repo.listSectors()).toEqual(['IT', '금융']);
  });

  it('queries a custom table', async () => {
    const { PgReportRepository } = await import('../db/pg-report-repository.js');
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await new PgReportRepository('reports_2024').loadAll();

    expect(mockQuery.mock.calls[0][0]).toContain('FROM reports_2024');
  });

  it('wraps driver failures in DataAccessError', async () => {
    mockQuery.mockRejectedValueOnce(new Error('connection refused'));

    const failure = repo.searchBySector('IT');

    await expect(failure).rejects.toBeInstanceOf(DataAccessError);
    await expect(failure).rejects.toMatchObject({
      operation: 'searchBySector',
      message: 'searchBySector failed: connection refused',
    });
  });

  it('wraps listSectors failures too', async () => {
    mockQuery.mockRejectedValueOnce(new Error('permission denied'));
    await expect(repo.listSectors()).rejects.toMatchObject({ name: 'DataAccessError', operation: 'listSectors' });
  });
});
