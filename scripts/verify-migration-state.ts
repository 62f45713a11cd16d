/* eslint-disable no-console */
import 'dotenv/config';
import { readdir } from 'node:fs/promises';
import { Client } from 'pg';
import { createPgExecutor, createPool } from '../src/db';
import { assertSchemaState, inspectSchemaState } from '../src/ddl/schemaState';
import { MIGRATIONS_DIR, MIGRATIONS_TABLE } from './migrate';

export type MigrationVerifyTarget = {
  dbName: string;
  host: string;
  port: number;
  user: string;
};

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} must be set`);
  }
  return value;
}

async function resolveLatestMigrationName(): Promise<string> {
  const entries = await readdir(MIGRATIONS_DIR, { withFileTypes: true });
  const latest = entries
    .filter((entry) => entry.isFile() && /^\d+.*\.(ts|js)$/i.test(entry.name))
    .map((entry) => entry.name.replace(/\.(ts|js)$/i, ''))
    .sort((a, b) => a.localeCompare(b))
    .at(-1);
  if (!latest) {
    throw new Error(`No migrations found in ${MIGRATIONS_DIR}`);
  }
  return latest;
}

function resolveTarget(databaseUrl: string): MigrationVerifyTarget {
  const params = new Client({ connectionString: databaseUrl });
  const port = Number(params.port);
  return {
    dbName: String(params.database ?? ''),
    host: String(params.host ?? ''),
    port: Number.isFinite(port) && port > 0 ? port : 5432,
    user: String(params.user ?? '')
  };
}

function formatTarget(target: MigrationVerifyTarget): string {
  return `dbName=${target.dbName} host=${target.host} port=${target.port} user=${target.user}`;
}

export async function verifyMigrationState(): Promise<void> {
  const databaseUrl = requiredEnv('DATABASE_URL');
  const target = resolveTarget(databaseUrl);
  const expectedLatestMigration = await resolveLatestMigrationName();
  console.log(JSON.stringify({ phase: 'migration_verify_target', ...target }));

  const pool = createPool(databaseUrl);
  try {
    const db = createPgExecutor(pool);
    const summary = await db.query<{ count: string; max_name: string | null; latest_applied: boolean | null }>(
      `SELECT COUNT(*)::text AS count,
              MAX(name) AS max_name,
              BOOL_OR(name = $1) AS latest_applied
         FROM ${MIGRATIONS_TABLE}`,
      [expectedLatestMigration]
    );
    const row = summary.rows[0];
    if (row?.latest_applied !== true) {
      throw new Error(
        `MIGRATION_STATE_INCOMPLETE ${formatTarget(target)} expected_latest=${expectedLatestMigration} max_applied=${row?.max_name ?? 'null'} count=${row?.count ?? '0'}`
      );
    }

    const state = await inspectSchemaState(db);
    assertSchemaState(state);

    console.log(
      JSON.stringify({
        ok: true,
        latestMigration: expectedLatestMigration,
        migrationCount: Number(row.count),
        checkedTables: state.existingTables,
        ...target
      })
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[migrate:verify] ${formatTarget(target)} ${message}`, { cause: error });
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  verifyMigrationState().catch((error) => {
    console.error('[migrate:verify] Failed:', error);
    process.exit(1);
  });
}
