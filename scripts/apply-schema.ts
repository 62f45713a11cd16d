/* eslint-disable no-console */
import 'dotenv/config';
import { createPgExecutor, createPool } from '../src/db';
import { applySchema } from '../src/ddl';
import { assertSchemaState, inspectSchemaState } from '../src/ddl/schemaState';

// Applies the DDL directly, without migration bookkeeping; safe to re-run.
async function main() {
  const pool = createPool(process.env.DATABASE_URL ?? '');
  try {
    const db = createPgExecutor(pool);
    const statements = await applySchema(db);
    const state = await inspectSchemaState(db);
    assertSchemaState(state);
    console.log(JSON.stringify({ ok: true, statements, tables: state.existingTables }));
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  console.error('[schema:apply] Failed:', error);
  process.exit(1);
});
