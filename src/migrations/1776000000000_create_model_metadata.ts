import type { MigrationBuilder } from 'node-pg-migrate';
import { MODEL_METADATA_DDL } from '../ddl/modelMetadata.ddl';

export async function up(pgm: MigrationBuilder): Promise<void> {
  for (const statement of MODEL_METADATA_DDL.create) {
    pgm.sql(statement);
  }
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  for (const statement of MODEL_METADATA_DDL.drop) {
    pgm.sql(statement);
  }
}
