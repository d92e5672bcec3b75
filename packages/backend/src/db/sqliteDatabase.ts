import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type { Database, DatabaseSession, QueryResult, Row, SqlValue } from '../config/database';

const PLACEHOLDER = /\$(\d+)/g;

/**
 * Rewrites `$n` placeholders to positional `?` markers and reorders the
 * parameters to match, so the same SQL text runs on both dialects.
 */
export function toPositional(sql: string, params: SqlValue[]): { sql: string; params: SqlValue[] } {
  const ordered: SqlValue[] = [];
  const rewritten = sql.replace(PLACEHOLDER, (_match, index: string) => {
    const position = Number(index) - 1;
    if (position < 0 || position >= params.length) {
      throw new Error(`Missing value for placeholder $${index}`);
    }
    ordered.push(params[position]);
    return '?';
  });
  return { sql: rewritten, params: ordered };
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

export class SqliteDatabase implements Database {
  readonly dialect = 'sqlite' as const;
  private db: BetterSqlite3.Database;
  private session: DatabaseSession;

  constructor(filename: string) {
    if (filename !== ':memory:') {
      mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }
    this.db = new BetterSqlite3(filename);
    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    const db = this.db;
    this.session = {
      async query(sql: string, params: SqlValue[] = []): Promise<QueryResult> {
        const positional = toPositional(sql, params);
        const statement = db.prepare(positional.sql);
        if (statement.reader) {
          const rows = statement.all(...positional.params).filter(isRow);
          return { rows, rowCount: rows.length };
        }
        const info = statement.run(...positional.params);
        return { rows: [], rowCount: info.changes };
      },
    };
  }

  // One connection serves every session; there is nothing to hand back.
  async withSession<T>(work: (session: DatabaseSession) => Promise<T>): Promise<T> {
    return work(this.session);
  }

  async ping(): Promise<void> {
    this.db.prepare('SELECT 1').get();
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
