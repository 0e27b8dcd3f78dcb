import { Pool } from "pg";

let _pool: Pool | null = null;

/** Connection wait for the liveness probe and for every checkout. */
export const CONNECTION_TIMEOUT_MS = 5000;

/**
 * Shared Postgres pool. Created on first use so the extract/transform/validate stages
 * run without DATABASE_URL.
 */
export function getPool(): Pool {
  if (!_pool) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error(
        "DATABASE_URL is not set. Copy .env.example to .env and configure Postgres."
      );
    }
    _pool = new Pool({
      connectionString,
      max: 4,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: CONNECTION_TIMEOUT_MS,
    });
  }
  return _pool;
}

/** Minimal query surface the loader needs. Tests pass a fake. */
export type SqlClient = {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
};

export function poolClient(): SqlClient {
  return {
    query: (text, params) => getPool().query(text, params),
  };
}

/**
 * Close the pool so the process can exit. Safe to call when no pool was created.
 */
export async function closePool(): Promise<void> {
  if (!_pool) return;
  const pool = _pool;
  _pool = null;
  await pool.end();
}
