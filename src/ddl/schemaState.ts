import type { SqlExecutor } from '../db';
import { placeholders } from '../lib/sql';
import { SCHEMA_TABLES } from './index';
import { MODEL_METADATA_TABLE, MODEL_METADATA_UPDATED_AT_TRIGGER } from './modelMetadata.ddl';

export type SchemaState = {
  existingTables: string[];
  missingTables: string[];
  updatedAtTriggerCount: number;
};

export async function inspectSchemaState(db: SqlExecutor): Promise<SchemaState> {
  const tableRes = await db.query<{ table_name: string }>(
    `SELECT table_name
       FROM information_schema.tables
      WHERE table_schema = current_schema()
        AND table_name IN (${placeholders(SCHEMA_TABLES.length)})`,
    [...SCHEMA_TABLES]
  );
  const existing = new Set(tableRes.rows.map((row) => row.table_name));

  const triggerRes = await db.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count
       FROM pg_trigger t
       JOIN pg_class r ON r.oid = t.tgrelid
      WHERE t.tgname = $1
        AND r.relname = $2
        AND NOT t.tgisinternal`,
    [MODEL_METADATA_UPDATED_AT_TRIGGER, MODEL_METADATA_TABLE]
  );

  return {
    existingTables: SCHEMA_TABLES.filter((name) => existing.has(name)),
    missingTables: SCHEMA_TABLES.filter((name) => !existing.has(name)),
    updatedAtTriggerCount: Number(triggerRes.rows[0]?.count ?? 0)
  };
}

/** Throws with an upper-snake code when a table is missing or the trigger is not installed exactly once. */
export function assertSchemaState(state: SchemaState): void {
  if (state.missingTables.length > 0) {
    throw new Error(`SCHEMA_STATE_MISSING_TABLES missing=${state.missingTables.join(',')}`);
  }
  if (state.updatedAtTriggerCount !== 1) {
    throw new Error(
      `SCHEMA_STATE_TRIGGER_COUNT trigger=${MODEL_METADATA_UPDATED_AT_TRIGGER} expected=1 actual=${state.updatedAtTriggerCount}`
    );
  }
}
