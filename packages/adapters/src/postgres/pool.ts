import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

let _pool: pg.Pool | null = null;

/**
 * Lazily creates the shared pool. Only the diagnostic endpoint touches the
 * database, so nothing connects until it is first asked to.
 */
export function getPool(connectionString = process.env['DATABASE_URL']): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString,
      max: 4,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'biostream-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}
