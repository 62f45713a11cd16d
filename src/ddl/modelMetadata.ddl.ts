import { commentOnColumn, commentOnTable } from './comments';
import type { TableDdl } from './types';

export const MODEL_METADATA_TABLE = 'model_metadata';
export const SET_UPDATED_AT_FUNCTION = 'set_updated_at';
export const MODEL_METADATA_UPDATED_AT_TRIGGER = 'model_metadata_updated_at';

export const MODEL_METADATA_COMMENTS = {
  table: 'One row per USEEIO model version; economic and satellite year range plus active flag for UI.',
  columns: {
    economic_year: 'Economic year from the demands sheet.',
    satellite_year_min: 'Minimum year from Rho (price deflator) columns.',
    satellite_year_max: 'Maximum year from Rho (price deflator) columns.',
    is_active: 'When true, UI uses this row for the active methodology.'
  }
} as const;

export const MODEL_METADATA_DDL: TableDdl = {
  table: MODEL_METADATA_TABLE,
  create: [
    `CREATE TABLE IF NOT EXISTS ${MODEL_METADATA_TABLE} (
      model_version text PRIMARY KEY,
      economic_year integer,
      satellite_year_min integer,
      satellite_year_max integer,
      is_active boolean NOT NULL DEFAULT false,
      created_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now()
    )`,
    commentOnTable(MODEL_METADATA_TABLE, MODEL_METADATA_COMMENTS.table),
    ...Object.entries(MODEL_METADATA_COMMENTS.columns).map(([column, text]) =>
      commentOnColumn(MODEL_METADATA_TABLE, column, text)
    ),
    // Overwrites whatever the UPDATE supplied for updated_at.
    `CREATE OR REPLACE FUNCTION ${SET_UPDATED_AT_FUNCTION}()
    RETURNS trigger
    LANGUAGE plpgsql
    AS $$
    BEGIN
      NEW.updated_at = now();
      RETURN NEW;
    END;
    $$`,
    `DROP TRIGGER IF EXISTS ${MODEL_METADATA_UPDATED_AT_TRIGGER} ON ${MODEL_METADATA_TABLE}`,
    `CREATE TRIGGER ${MODEL_METADATA_UPDATED_AT_TRIGGER}
    BEFORE UPDATE ON ${MODEL_METADATA_TABLE}
    FOR EACH ROW
    EXECUTE FUNCTION ${SET_UPDATED_AT_FUNCTION}()`
  ],
  drop: [
    `DROP TRIGGER IF EXISTS ${MODEL_METADATA_UPDATED_AT_TRIGGER} ON ${MODEL_METADATA_TABLE}`,
    `DROP TABLE IF EXISTS ${MODEL_METADATA_TABLE}`,
    `DROP FUNCTION IF EXISTS ${SET_UPDATED_AT_FUNCTION}()`
  ]
};
