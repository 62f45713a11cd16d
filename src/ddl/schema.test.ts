import { afterEach, describe, expect, it } from 'vitest';
import type { MigrationBuilder } from 'node-pg-migrate';
import * as createModelMetadata from '../migrations/1776000000000_create_model_metadata';
import * as createIpccArGwp from '../migrations/1776000100000_create_ipcc_ar_gwp';
import * as createCharacterization from '../migrations/1776000200000_create_c';
import { createTestDatabase, type TestDatabase } from '../testing/pglite';
import {
  applySchema,
  CHARACTERIZATION_COMMENTS,
  dropSchema,
  IPCC_AR_GWP_COMMENTS,
  MODEL_METADATA_COMMENTS,
  SCHEMA_DROP_STATEMENTS,
  SCHEMA_STATEMENTS
} from './index';
import { assertSchemaState, inspectSchemaState } from './schemaState';

const MIGRATIONS = [createModelMetadata, createIpccArGwp, createCharacterization];

function recordingBuilder() {
  const statements: string[] = [];
  const pgm = {
    sql: (statement: string) => {
      statements.push(statement);
    }
  } as unknown as MigrationBuilder;
  return { pgm, statements };
}

async function primaryKeyColumns(database: TestDatabase, table: string): Promise<string[]> {
  const res = await database.db.query<{ column_name: string }>(
    `SELECT a.attname AS column_name
       FROM pg_index i
       JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)
      WHERE i.indrelid = $1::regclass
        AND i.indisprimary
      ORDER BY array_position(i.indkey::int2[], a.attnum)`,
    [table]
  );
  return res.rows.map((row) => row.column_name);
}

async function columnComments(database: TestDatabase, table: string): Promise<Record<string, string>> {
  const res = await database.db.query<{ column_name: string; description: string | null }>(
    `SELECT a.attname AS column_name, col_description(a.attrelid, a.attnum) AS description
       FROM pg_attribute a
      WHERE a.attrelid = $1::regclass
        AND a.attnum > 0
        AND NOT a.attisdropped`,
    [table]
  );
  const comments: Record<string, string> = {};
  for (const row of res.rows) {
    if (row.description !== null) comments[row.column_name] = row.description;
  }
  return comments;
}

async function tableComment(database: TestDatabase, table: string): Promise<string | null> {
  const res = await database.db.query<{ description: string | null }>(
    `SELECT obj_description($1::regclass, 'pg_class') AS description`,
    [table]
  );
  return res.rows[0]?.description ?? null;
}

describe('schema creation', () => {
  let database: TestDatabase | undefined;

  afterEach(async () => {
    await database?.close();
    database = undefined;
  });

  it('creates the three tables and installs the update trigger once', async () => {
    database = await createTestDatabase({ applySchema: false });
    await applySchema(database.db);

    const state = await inspectSchemaState(database.db);
    expect(state).toEqual({
      existingTables: ['model_metadata', 'ipcc_ar_gwp', 'c'],
      missingTables: [],
      updatedAtTriggerCount: 1
    });
    expect(() => assertSchemaState(state)).not.toThrow();
  });

  it('is a no-op when applied again', async () => {
    database = await createTestDatabase({ applySchema: false });
    await applySchema(database.db);
    await database.db.query(`INSERT INTO ipcc_ar_gwp (gas_name, ar_version, gwp_value) VALUES ('Nitrous oxide', 'AR5', 265)`);

    await expect(applySchema(database.db)).resolves.toBe(SCHEMA_STATEMENTS.length);

    const state = await inspectSchemaState(database.db);
    expect(state.updatedAtTriggerCount).toBe(1);
    const functions = await database.db.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM pg_proc WHERE proname = 'set_updated_at'`
    );
    expect(functions.rows[0].count).toBe(1);
    const kept = await database.db.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ipcc_ar_gwp`);
    expect(kept.rows[0].count).toBe(1);
  });

  it('upgrades a legacy reference table to accept display-only values', async () => {
    database = await createTestDatabase({ applySchema: false });
    await database.db.query(
      `CREATE TABLE ipcc_ar_gwp (
        gas_name text NOT NULL,
        ar_version text NOT NULL,
        gwp_value numeric NOT NULL,
        category text,
        PRIMARY KEY (gas_name, ar_version)
      )`
    );

    await applySchema(database.db);
    await database.db.query(
      `INSERT INTO ipcc_ar_gwp (gas_name, ar_version, gwp_value, gwp_display) VALUES ('HFO-1234yf', 'AR5', NULL, '<1')`
    );

    const res = await database.db.query<{ gwp_value: string | null; gwp_display: string | null }>(
      `SELECT gwp_value, gwp_display FROM ipcc_ar_gwp WHERE gas_name = 'HFO-1234yf'`
    );
    expect(res.rows).toEqual([{ gwp_value: null, gwp_display: '<1' }]);
  });

  it('keeps the primary key composition of every table', async () => {
    database = await createTestDatabase();

    expect(await primaryKeyColumns(database, 'model_metadata')).toEqual(['model_version']);
    expect(await primaryKeyColumns(database, 'ipcc_ar_gwp')).toEqual(['gas_name', 'ar_version']);
    expect(await primaryKeyColumns(database, 'c')).toEqual(['model_version', 'indicator_code', 'flow']);
  });

  it('attaches table and column documentation', async () => {
    database = await createTestDatabase();

    expect(await tableComment(database, 'model_metadata')).toBe(MODEL_METADATA_COMMENTS.table);
    expect(await tableComment(database, 'ipcc_ar_gwp')).toBe(IPCC_AR_GWP_COMMENTS.table);
    expect(await tableComment(database, 'c')).toBe(CHARACTERIZATION_COMMENTS.table);
    expect(await columnComments(database, 'model_metadata')).toEqual(MODEL_METADATA_COMMENTS.columns);
    expect(await columnComments(database, 'ipcc_ar_gwp')).toEqual(IPCC_AR_GWP_COMMENTS.columns);
    expect(await columnComments(database, 'c')).toEqual(CHARACTERIZATION_COMMENTS.columns);
  });

  it('reports missing tables after the schema is dropped', async () => {
    database = await createTestDatabase();
    await dropSchema(database.db);

    const state = await inspectSchemaState(database.db);
    expect(state.missingTables).toEqual(['model_metadata', 'ipcc_ar_gwp', 'c']);
    expect(state.updatedAtTriggerCount).toBe(0);
    expect(() => assertSchemaState(state)).toThrow('SCHEMA_STATE_MISSING_TABLES missing=model_metadata,ipcc_ar_gwp,c');
  });

  it('flags a schema whose trigger is missing', () => {
    expect(() =>
      assertSchemaState({ existingTables: ['model_metadata', 'ipcc_ar_gwp', 'c'], missingTables: [], updatedAtTriggerCount: 0 })
    ).toThrow('SCHEMA_STATE_TRIGGER_COUNT trigger=model_metadata_updated_at expected=1 actual=0');
  });
});

describe('migrations', () => {
  let database: TestDatabase | undefined;

  afterEach(async () => {
    await database?.close();
    database = undefined;
  });

  it('replay the schema statements in order when migrating up', async () => {
    const { pgm, statements } = recordingBuilder();
    for (const migration of MIGRATIONS) {
      await migration.up(pgm);
    }
    expect(statements).toEqual(SCHEMA_STATEMENTS);

    database = await createTestDatabase({ applySchema: false });
    for (const statement of statements) {
      await database.db.query(statement);
    }
    expect((await inspectSchemaState(database.db)).missingTables).toEqual([]);
  });

  it('drop every structure when migrating down in reverse order', async () => {
    const { pgm, statements } = recordingBuilder();
    for (const migration of [...MIGRATIONS].reverse()) {
      await migration.down(pgm);
    }
    expect(statements).toEqual(SCHEMA_DROP_STATEMENTS);

    database = await createTestDatabase();
    for (const statement of statements) {
      await database.db.query(statement);
    }
    expect((await inspectSchemaState(database.db)).existingTables).toEqual([]);
  });
});
