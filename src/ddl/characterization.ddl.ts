import { commentOnColumn, commentOnTable } from './comments';
import type { TableDdl } from './types';

export const CHARACTERIZATION_TABLE = 'c';

export const CHARACTERIZATION_COMMENTS = {
  table: 'Characterization matrix C: indicator × flow factors (e.g. GWP per flow), loaded from workbook sheet C.',
  columns: {
    flow: 'Flow identifier (e.g. Methane/emission/air/kg, HFC-134a/emission/air/kg).',
    value: 'Characterization factor (e.g. GWP for that flow).'
  }
} as const;

// No foreign key on model_version: the loader may write factors before (or without) metadata.
export const CHARACTERIZATION_DDL: TableDdl = {
  table: CHARACTERIZATION_TABLE,
  create: [
    `CREATE TABLE IF NOT EXISTS ${CHARACTERIZATION_TABLE} (
      model_version text NOT NULL,
      indicator_code text NOT NULL,
      flow text NOT NULL,
      value numeric NOT NULL,
      PRIMARY KEY (model_version, indicator_code, flow)
    )`,
    commentOnTable(CHARACTERIZATION_TABLE, CHARACTERIZATION_COMMENTS.table),
    ...Object.entries(CHARACTERIZATION_COMMENTS.columns).map(([column, text]) =>
      commentOnColumn(CHARACTERIZATION_TABLE, column, text)
    )
  ],
  drop: [`DROP TABLE IF EXISTS ${CHARACTERIZATION_TABLE}`]
};
