// PG client: connection pool singleton for the report store
// Provides pool management, health check, migration runner and retrying queries

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// pg is dynamically imported so it's only loaded when the postgres backend is selected
let _pool: import('pg').Pool | null = null;
let _pg: typeof import('pg') | null = null;

async function loadPg(): Promise<typeof import('pg')> {
  if (!_pg) {
    _pg = await import('pg');
  }
  return _pg;
}

export interface PgConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMin?: number;
  poolMax?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PgConfig {
  return {
    host: env.PG_HOST ?? 'localhost',
    port: Number(env.PG_PORT ?? 5432),
    user: env.PG_USER ?? 'vqa',
    password: env.PG_PASSWORD ?? '',
    database: env.PG_DATABASE ?? 'valuation_reports',
    poolMin: Number(env.PG_POOL_MIN ?? 0),
    poolMax: Number(env.PG_POOL_MAX ?? 10),
    idleTimeoutMs: Number(env.PG_IDLE_TIMEOUT_MS ?? 30_000),
    connectionTimeoutMs: Number(env.PG_CONNECTION_TIMEOUT_MS ?? 5_000),
  };
}

/**
 * Returns the shared pg.Pool singleton, creating it on first call.
 */
export async function getPool(config?: PgConfig): Promise<import('pg').Pool> {
  if (_pool) return _pool;

  const pg = await loadPg();
  const c = config ?? configFromEnv();

  const pool = new pg.default.Pool({
    host: c.host,
    port: c.port,
    user: c.user,
    password: c.password,
    database: c.database,
    min: c.poolMin,
    max: c.poolMax,
    idleTimeoutMillis: c.idleTimeoutMs,
    connectionTimeoutMillis: c.connectionTimeoutMs,
    statement_timeout: 30_000,
    application_name: 'valuation-qa',
  });

  // Never crash the process on idle-client errors
  pool.on('error', (err) => {
    console.warn('[pg-client] pool background error, resetting pool:', err.message);
    resetPool().catch((resetErr: unknown) => {
      console.warn('[pg-client] pool reset failed:', resetErr instanceof Error ? resetErr.message : resetErr);
    });
  });

  _pool = pool;
  return pool;
}

/**
 * Verify database connectivity. Returns true if the pool can reach the database.
 */
export async function healthCheck(): Promise<boolean> {
  try {
    const pool = await getPool();
    const result = await pool.query<{ ok: number }>('SELECT 1 AS ok');
    return result.rows[0]?.ok === 1;
  } catch (err) {
    console.warn('[pg-client] health check failed:', err instanceof Error ? err.message : err);
    return false;
  }
}

/**
 * Run all pending SQL migrations from db/migrations/ in version order.
 * Each migration is wrapped in a transaction with its version recording.
 */
export async function runMigrations(): Promise<string[]> {
  const pool = await getPool();

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  const { rows: applied } = await pool.query<{ version: string }>(
    'SELECT version FROM schema_migrations ORDER BY version',
  );
  const appliedSet = new Set(applied.map(r => r.version));

  const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), 'migrations');
  if (!existsSync(migrationsDir)) return [];

  const migrationFiles = readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  const ran: string[] = [];
  for (const file of migrationFiles) {
    const version = file.replace('.sql', '');
    if (appliedSet.has(version)) continue;

    const sql = readFileSync(join(migrationsDir, file), 'utf-8');

    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query(
        'INSERT INTO schema_migrations (version) VALUES ($1)',
        [version],
      );
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }

    ran.push(version);
  }

  return ran;
}

/**
 * Close the pool and release all connections.
 */
export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/**
 * Drop the current pool so the next getPool() creates a fresh one.
 */
export async function resetPool(): Promise<void> {
  const pool = _pool;
  _pool = null;
  if (!pool) return;
  try {
    await pool.end();
  } catch (err) {
    console.warn('[pg-client] ending broken pool failed:', err instanceof Error ? err.message : err);
  }
}

const RECOVERABLE_MESSAGES = [
  'Connection terminated',
  'recovery mode',
  'the database system is starting up',
  'connection refused',
  'terminating connection',
];

/**
 * Execute a query with automatic retry on connection/recovery errors.
 * Uses exponential backoff: base delay * 3^attempt (1s → 3s → 9s by default).
 */
export async function queryWithRetry<T extends import('pg').QueryResultRow>(
  queryText: string,
  params: unknown[],
  maxRetries = Number(process.env.PG_RETRY_MAX ?? 2),
  retryDelayMs = Number(process.env.PG_RETRY_DELAY_MS ?? 1000),
): Promise<import('pg').QueryResult<T>> {
  for (let attempt = 0; ; attempt++) {
    try {
      const pool = await getPool();
      return await pool.query<T>(queryText, params);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      const isRecoverable = RECOVERABLE_MESSAGES.some(m => msg.includes(m));

      if (attempt < maxRetries && isRecoverable) {
        const delay = retryDelayMs * Math.pow(3, attempt);
        console.warn(
          `[pg-client] queryWithRetry attempt ${attempt + 1}/${maxRetries} failed: ${msg}. ` +
          `Retrying in ${delay}ms...`,
        );
        await resetPool();
        await new Promise(r => setTimeout(r, delay));
        continue;
      }

      console.error(
        `[pg-client] queryWithRetry failed after ${attempt + 1} attempt(s): ${msg}`,
      );
      throw err;
    }
  }
}
