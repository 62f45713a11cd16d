import { commentOnColumn, commentOnTable } from './comments';
import type { TableDdl } from './types';

export const IPCC_AR_GWP_TABLE = 'ipcc_ar_gwp';

export const IPCC_AR_GWP_COMMENTS = {
  table: 'IPCC Assessment Report GWP factors for GHG; used to resolve GWP by gas and AR version.',
  columns: {
    gas_name: 'Gas name (e.g. Methane (non-fossil), Nitrous oxide).',
    ar_version: 'IPCC AR version: AR4, AR5, or AR6.',
    gwp_value: 'Global warming potential (CO2-equivalent). NULL when source was e.g. "<1"; use gwp_display for display.',
    gwp_display: 'When source was e.g. "<1", use this for display instead of gwp_value.',
    category: 'Category (e.g. Major GHG).'
  }
} as const;

export const IPCC_AR_GWP_DDL: TableDdl = {
  table: IPCC_AR_GWP_TABLE,
  create: [
    `CREATE TABLE IF NOT EXISTS ${IPCC_AR_GWP_TABLE} (
      gas_name text NOT NULL,
      ar_version text NOT NULL,
      gwp_value numeric,
      gwp_display text,
      category text,
      PRIMARY KEY (gas_name, ar_version)
    )`,
    // Tables created before gwp_display existed, when gwp_value was required.
    `ALTER TABLE ${IPCC_AR_GWP_TABLE} ADD COLUMN IF NOT EXISTS gwp_display text`,
    `ALTER TABLE ${IPCC_AR_GWP_TABLE} ALTER COLUMN gwp_value DROP NOT NULL`,
    commentOnTable(IPCC_AR_GWP_TABLE, IPCC_AR_GWP_COMMENTS.table),
    ...Object.entries(IPCC_AR_GWP_COMMENTS.columns).map(([column, text]) =>
      commentOnColumn(IPCC_AR_GWP_TABLE, column, text)
    )
  ],
  drop: [`DROP TABLE IF EXISTS ${IPCC_AR_GWP_TABLE}`]
};
