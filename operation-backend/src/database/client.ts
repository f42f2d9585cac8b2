import pg from 'pg';
import type { BackendConfig } from '../config/index.js';

const { Pool } = pg;

export interface QueryResult<T> {
  rows: T[];
  rowCount: number | null;
}

/** The slice of a pg pool the repositories use. */
export interface Queryable {
  query<T extends pg.QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export class DatabaseClient implements Queryable {
  private pool: pg.Pool;

  constructor(database: BackendConfig['database']) {
    this.pool = new Pool({
      host: database.host,
      port: database.port,
      database: database.database,
      user: database.user,
      password: database.password,
    });
  }

  async query<T extends pg.QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    const client = await this.pool.connect();
    try {
      return await client.query<T>(text, params);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
