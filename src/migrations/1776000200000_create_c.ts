import type { MigrationBuilder } from 'node-pg-migrate';
import { CHARACTERIZATION_DDL } from '../ddl/characterization.ddl';

export async function up(pgm: MigrationBuilder): Promise<void> {
  for (const statement of CHARACTERIZATION_DDL.create) {
    pgm.sql(statement);
  }
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  for (const statement of CHARACTERIZATION_DDL.drop) {
    pgm.sql(statement);
  }
}
