// Database factory: selects the report backend based on VQA_DATA_BACKEND env var
// Supported values: 'local' (default), 'postgres' (alias 'pg')

import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ReportRepository } from '../db/report-repository.js';

export type DataBackend = 'local' | 'postgres';

export const DEFAULT_LOCAL_DATA_PATH = join(dirname(fileURLToPath(import.meta.url)), 'data', 'reports.json');

export function getBackend(env: NodeJS.ProcessEnv = process.env): DataBackend {
  const value = env.VQA_DATA_BACKEND?.toLowerCase();
  if (value === 'postgres' || value === 'pg') return 'postgres';
  return 'local';
}

/**
 * Create a ReportRepository for the configured backend.
 * - `local`: InMemoryReportRepository over the JSON file at VQA_LOCAL_DATA_PATH
 * - `postgres`: PgReportRepository (pg pool configured from PG_* variables)
 */
export async function createReportRepository(
  env: NodeJS.ProcessEnv = process.env,
): Promise<ReportRepository> {
  switch (getBackend(env)) {
    case 'postgres': {
      const { PgReportRepository } = await import('../db/pg-report-repository.js');
      return new PgReportRepository();
    }
    case 'local':
    default: {
      const { InMemoryReportRepository } = await import('../db/report-repository.js');
      return InMemoryReportRepository.fromFile(env.VQA_LOCAL_DATA_PATH ?? DEFAULT_LOCAL_DATA_PATH);
    }
  }
}
