import type { MigrationBuilder } from 'node-pg-migrate';
import { IPCC_AR_GWP_DDL } from '../ddl/ipccArGwp.ddl';

export async function up(pgm: MigrationBuilder): Promise<void> {
  for (const statement of IPCC_AR_GWP_DDL.create) {
    pgm.sql(statement);
  }
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  for (const statement of IPCC_AR_GWP_DDL.drop) {
    pgm.sql(statement);
  }
}
