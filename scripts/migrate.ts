/* eslint-disable no-console */
import 'dotenv/config';
import path from 'node:path';
import { runner } from 'node-pg-migrate';

export const MIGRATIONS_DIR = path.join(process.cwd(), 'src', 'migrations');
export const MIGRATIONS_TABLE = 'useeio_schema_migrations';

type Direction = 'up' | 'down';

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} must be set`);
  }
  return value;
}

function parseDirection(value: string | undefined): Direction {
  if (value === undefined || value === 'up') return 'up';
  if (value === 'down') return 'down';
  throw new Error(`MIGRATE_DIRECTION_INVALID direction=${value} (expected up or down)`);
}

export async function main(argv: string[] = process.argv.slice(2)) {
  const direction = parseDirection(argv[0]);
  const databaseUrl = requiredEnv('DATABASE_URL');

  console.log(JSON.stringify({ phase: 'migrate_start', direction, dir: MIGRATIONS_DIR, table: MIGRATIONS_TABLE }));
  const applied = await runner({
    databaseUrl,
    dir: MIGRATIONS_DIR,
    direction,
    migrationsTable: MIGRATIONS_TABLE,
    // Rolling back is one step at a time.
    count: direction === 'down' ? 1 : Infinity,
    log: (message: string) => console.log(`[migrate] ${message}`)
  });
  console.log(
    JSON.stringify({ ok: true, phase: 'migrate_done', direction, migrations: applied.map((migration) => migration.name) })
  );
}

if (require.main === module) {
  main().catch((error) => {
    console.error('[migrate] Failed:', error);
    process.exit(1);
  });
}
