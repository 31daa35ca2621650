import type { DatabaseProbePort } from '@biostream/domain';
import { getPool } from './pool.js';
import type { DbPool } from './pool.js';

type QueryPool = Pick<DbPool, 'query'>;

export class PgDatabaseProbe implements DatabaseProbePort {
  constructor(
    private readonly connectionString: string | undefined,
    private readonly pool: () => QueryPool = () => getPool(connectionString),
  ) {}

  isConfigured(): boolean {
    return Boolean(this.connectionString);
  }

  async connect(): Promise<string> {
    const { rows } = await this.pool().query<{ name: string }>(
      'SELECT current_database() AS name',
    );
    return rows[0]?.name ?? 'unknown';
  }

  async listCollections(limit: number): Promise<string[]> {
    const { rows } = await this.pool().query<{ tableName: string }>(
      `SELECT table_name AS "tableName"
         FROM information_schema.tables
        WHERE table_schema NOT IN ('pg_catalog', 'information_schema')
        ORDER BY table_schema, table_name
        LIMIT $1`,
      [limit],
    );
    return rows.map((row) => row.tableName);
  }
}
