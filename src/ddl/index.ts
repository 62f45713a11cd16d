import type { SqlExecutor } from '../db';
import { CHARACTERIZATION_DDL } from './characterization.ddl';
import { IPCC_AR_GWP_DDL } from './ipccArGwp.ddl';
import { MODEL_METADATA_DDL } from './modelMetadata.ddl';
import type { TableDdl } from './types';

export * from './characterization.ddl';
export * from './ipccArGwp.ddl';
export * from './modelMetadata.ddl';
export type { TableDdl } from './types';

export const SCHEMA_DDL: readonly TableDdl[] = [MODEL_METADATA_DDL, IPCC_AR_GWP_DDL, CHARACTERIZATION_DDL];

export const SCHEMA_TABLES: readonly string[] = SCHEMA_DDL.map((ddl) => ddl.table);

export const SCHEMA_STATEMENTS: readonly string[] = SCHEMA_DDL.flatMap((ddl) => ddl.create);

export const SCHEMA_DROP_STATEMENTS: readonly string[] = [...SCHEMA_DDL].reverse().flatMap((ddl) => ddl.drop);

async function runStatements(db: SqlExecutor, statements: readonly string[]): Promise<number> {
  return db.transaction(async (tx) => {
    for (const statement of statements) {
      await tx.query(statement);
    }
    return statements.length;
  });
}

/** Creates (or re-creates in place) every table, comment and the update trigger. */
export function applySchema(db: SqlExecutor): Promise<number> {
  return runStatements(db, SCHEMA_STATEMENTS);
}

export function dropSchema(db: SqlExecutor): Promise<number> {
  return runStatements(db, SCHEMA_DROP_STATEMENTS);
}
