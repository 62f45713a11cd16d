/* eslint-disable no-console */
import 'dotenv/config';
import { Client } from 'pg';
import { SCHEMA_TABLES } from '../src/ddl';
import { placeholders } from '../src/lib/sql';

type ConnectionTarget = { database: string; user: string; host: string; port: number };

function parseDatabaseUrl(databaseUrl: string): ConnectionTarget {
  const url = new URL(databaseUrl);
  return {
    database: url.pathname.replace(/^\//, ''),
    user: decodeURIComponent(url.username || ''),
    host: url.hostname || 'localhost',
    port: url.port ? Number(url.port) : 5432
  };
}

// Confirms DATABASE_URL reaches the intended database before a load.
async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) throw new Error('DATABASE_URL must be set');
  const parsed = parseDatabaseUrl(databaseUrl);

  const client = new Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    const identity = await client.query<{ current_user: string; current_database: string }>(
      'select current_user as current_user, current_database() as current_database'
    );
    const row = identity.rows[0];
    if (!row) {
      throw new Error('Failed to query current_user/current_database');
    }
    if (row.current_database !== parsed.database) {
      throw new Error(
        `DATABASE_MISMATCH host=${parsed.host} port=${parsed.port} parsed_db=${parsed.database} actual_db=${row.current_database}`
      );
    }

    const tables = await client.query<{ table_name: string }>(
      `SELECT table_name
         FROM information_schema.tables
        WHERE table_schema = current_schema()
          AND table_name IN (${placeholders(SCHEMA_TABLES.length)})`,
      [...SCHEMA_TABLES]
    );
    const present = new Set(tables.rows.map((table) => table.table_name));
    console.log(
      `[db:conn:check] host=${parsed.host} port=${parsed.port} db=${row.current_database} user=${row.current_user} ` +
        `tables=${SCHEMA_TABLES.filter((table) => present.has(table)).join(',') || 'none'}`
    );
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  console.error('[db:conn:check] Failed:', err);
  process.exit(1);
});
