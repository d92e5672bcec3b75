import { Pool } from 'pg';
import type { Database, DatabaseSession, QueryResult, SqlValue } from '../config/database';

export interface PostgresOptions {
  max?: number;
}

export class PostgresDatabase implements Database {
  readonly dialect = 'postgres' as const;
  private pool: Pool;

  constructor(connectionString: string, options: PostgresOptions = {}) {
    this.pool = new Pool({ connectionString, max: options.max });
    this.pool.on('error', (err) => {
      console.error('[Database] Idle client error:', err.message);
    });
  }

  async withSession<T>(work: (session: DatabaseSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const session: DatabaseSession = {
      async query(sql: string, params: SqlValue[] = []): Promise<QueryResult> {
        const result = await client.query(sql, params);
        return { rows: result.rows, rowCount: result.rowCount ?? 0 };
      },
    };
    try {
      return await work(session);
    } finally {
      client.release();
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
