import { Pool } from 'pg';
import type { PoolClient, QueryResultRow } from 'pg';

export type SqlResult<T> = {
  rows: T[];
  rowCount: number;
};

/**
 * The slice of a Postgres connection the services need. Production code wraps a
 * `pg` Pool; tests wrap an in-process PGlite instance.
 */
export type SqlExecutor = {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<T>>;
  /** Inside a transaction, nested calls reuse the open transaction. */
  transaction<T>(handler: (tx: SqlExecutor) => Promise<T>): Promise<T>;
};

export function createPool(databaseUrl: string): Pool {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL must be set before connecting');
  }
  return new Pool({ connectionString: databaseUrl });
}

export async function withTransaction<T>(pool: Pool, handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

function clientExecutor(client: PoolClient): SqlExecutor {
  const executor: SqlExecutor = {
    async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<T>> {
      const result = await client.query<T>(text, params);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    },
    transaction<T>(handler: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      return handler(executor);
    }
  };
  return executor;
}

export function createPgExecutor(pool: Pool): SqlExecutor {
  return {
    async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<T>> {
      const result = await pool.query<T>(text, params);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    },
    transaction<T>(handler: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      return withTransaction(pool, (client) => handler(clientExecutor(client)));
    }
  };
}
