import { PGlite } from '@electric-sql/pglite';
import type { QueryResultRow } from 'pg';
import type { SqlExecutor, SqlResult } from '../db';
import { applySchema } from '../ddl';

type PgliteQueryable = {
  query<T>(text: string, params?: unknown[]): Promise<{ rows: T[]; affectedRows?: number }>;
};

async function runQuery<T>(target: PgliteQueryable, text: string, params?: unknown[]): Promise<SqlResult<T>> {
  const result = await target.query<T>(text, params);
  return { rows: result.rows, rowCount: result.affectedRows ?? 0 };
}

function transactionExecutor(tx: PgliteQueryable): SqlExecutor {
  const executor: SqlExecutor = {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<T>> {
      return runQuery<T>(tx, text, params);
    },
    transaction<T>(handler: (inner: SqlExecutor) => Promise<T>): Promise<T> {
      return handler(executor);
    }
  };
  return executor;
}

/** SqlExecutor over an in-process PGlite database, for tests. */
export function createPgliteExecutor(pglite: PGlite): SqlExecutor {
  return {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<T>> {
      return runQuery<T>(pglite, text, params);
    },
    transaction<T>(handler: (tx: SqlExecutor) => Promise<T>): Promise<T> {
      return pglite.transaction((tx) => handler(transactionExecutor(tx)));
    }
  };
}

export type TestDatabase = {
  db: SqlExecutor;
  pglite: PGlite;
  /** Empties the three tables; the schema stays. */
  reset(): Promise<void>;
  close(): Promise<void>;
};

export async function createTestDatabase(options: { applySchema?: boolean } = {}): Promise<TestDatabase> {
  const pglite = await PGlite.create();
  const db = createPgliteExecutor(pglite);
  if (options.applySchema ?? true) {
    await applySchema(db);
  }
  return {
    db,
    pglite,
    reset: async () => {
      await pglite.query('TRUNCATE model_metadata, ipcc_ar_gwp, c');
    },
    close: () => pglite.close()
  };
}
