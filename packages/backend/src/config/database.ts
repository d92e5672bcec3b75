import { PostgresDatabase } from '../db/postgresDatabase';
import { SqliteDatabase } from '../db/sqliteDatabase';

export type SqlValue = string | number | null;

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  rowCount: number;
}

export type Dialect = 'postgres' | 'sqlite';

/**
 * A connection checked out for the duration of one unit of work.
 * SQL uses `$1`-style placeholders regardless of dialect.
 */
export interface DatabaseSession {
  query(sql: string, params?: SqlValue[]): Promise<QueryResult>;
}

export interface Database {
  readonly dialect: Dialect;
  /**
   * Checks out a session, runs `work` with it and releases it afterwards,
   * whether `work` resolves or rejects.
   */
  withSession<T>(work: (session: DatabaseSession) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export type DatabaseTarget =
  | { dialect: 'postgres'; connectionString: string }
  | { dialect: 'sqlite'; filename: string };

export function parseDatabaseUrl(url: string): DatabaseTarget {
  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return { dialect: 'postgres', connectionString: url };
  }
  if (url.startsWith('sqlite:')) {
    let filename = url.slice('sqlite:'.length);
    if (filename.startsWith('///')) {
      filename = filename.slice(3);
    } else if (filename.startsWith('//')) {
      filename = filename.slice(2);
    }
    return { dialect: 'sqlite', filename: filename === '' ? ':memory:' : filename };
  }
  throw new Error(`Unsupported DATABASE_URL scheme: ${url.split(':')[0]}`);
}

export interface DatabaseOptions {
  poolMax?: number;
}

export function createDatabase(url: string, options: DatabaseOptions = {}): Database {
  const target = parseDatabaseUrl(url);
  if (target.dialect === 'postgres') {
    return new PostgresDatabase(target.connectionString, { max: options.poolMax });
  }
  return new SqliteDatabase(target.filename);
}
