import type { SqlExecutor } from '../db';
import { mapConstraintErrors } from '../lib/pgErrors';
import { toNullableNumber, toNumber } from '../lib/numbers';
import { chunk, maxRowsPerStatement, valuesPlaceholders } from '../lib/sql';
import { getActiveModelMetadata } from './modelMetadata.service';

export const DEFAULT_CHARACTERIZATION_BATCH_SIZE = 2000;

const CHARACTERIZATION_COLUMN_COUNT = 4;

/** Largest batch whose INSERT stays within the bind parameter limit. */
export const MAX_CHARACTERIZATION_BATCH_SIZE = maxRowsPerStatement(CHARACTERIZATION_COLUMN_COUNT);

export type CharacterizationKey = {
  modelVersion: string;
  indicatorCode: string;
  flow: string;
};

export type CharacterizationFactor = CharacterizationKey & {
  value: number;
};

export type ResolvedFlowFactor = CharacterizationFactor & {
  /** Gas implied by the flow name, e.g. "Methane" for "Methane/emission/air/kg". */
  impliedGasName: string;
  gwp: {
    gasName: string;
    arVersion: string;
    gwpValue: number | null;
    gwpDisplay: string | null;
    category: string | null;
  } | null;
};

type CharacterizationRow = {
  model_version: string;
  indicator_code: string;
  flow: string;
  value: string | number;
};

type ResolvedFlowFactorRow = CharacterizationRow & {
  implied_gas_name: string;
  gas_name: string | null;
  gwp_value: string | number | null;
  gwp_display: string | null;
  category: string | null;
};

function mapCharacterizationFactor(row: CharacterizationRow): CharacterizationFactor {
  return {
    modelVersion: row.model_version,
    indicatorCode: row.indicator_code,
    flow: row.flow,
    value: toNumber(row.value)
  };
}

/** The gas a flow refers to: its first `/`-separated segment. */
export function flowGasName(flow: string): string {
  return flow.split('/')[0].trim();
}

/**
 * Bulk insert in batches, all inside one transaction. A null value or a key
 * that already exists fails the whole call with a StoreConstraintError.
 * Batches larger than MAX_CHARACTERIZATION_BATCH_SIZE are clamped.
 */
export async function insertCharacterizationFactors(
  db: SqlExecutor,
  factors: readonly CharacterizationFactor[],
  options: { batchSize?: number } = {}
): Promise<number> {
  const batchSize = Math.min(options.batchSize ?? DEFAULT_CHARACTERIZATION_BATCH_SIZE, MAX_CHARACTERIZATION_BATCH_SIZE);
  const batches = chunk(factors, batchSize);
  return db.transaction(async (tx) => {
    let inserted = 0;
    for (const batch of batches) {
      const params = batch.flatMap((factor) => [factor.modelVersion, factor.indicatorCode, factor.flow, factor.value]);
      const res = await mapConstraintErrors(() =>
        tx.query(
          `INSERT INTO c (model_version, indicator_code, flow, value)
           VALUES ${valuesPlaceholders(batch.length, CHARACTERIZATION_COLUMN_COUNT)}`,
          params
        )
      );
      inserted += res.rowCount;
    }
    return inserted;
  });
}

/** Clears one model version from the matrix and from model_metadata. */
export async function deleteModelVersion(
  db: SqlExecutor,
  modelVersion: string
): Promise<{ characterizationRows: number; modelMetadataRows: number }> {
  return db.transaction(async (tx) => {
    const factors = await tx.query(`DELETE FROM c WHERE model_version = $1`, [modelVersion]);
    const metadata = await tx.query(`DELETE FROM model_metadata WHERE model_version = $1`, [modelVersion]);
    return { characterizationRows: factors.rowCount, modelMetadataRows: metadata.rowCount };
  });
}

export async function getCharacterizationFactor(db: SqlExecutor, key: CharacterizationKey): Promise<number | null> {
  const res = await db.query<{ value: string | number }>(
    `SELECT value
       FROM c
      WHERE model_version = $1
        AND indicator_code = $2
        AND flow = $3`,
    [key.modelVersion, key.indicatorCode, key.flow]
  );
  if (res.rows.length === 0) return null;
  return toNumber(res.rows[0].value);
}

export async function listFlowsForIndicator(
  db: SqlExecutor,
  modelVersion: string,
  indicatorCode: string
): Promise<CharacterizationFactor[]> {
  const res = await db.query<CharacterizationRow>(
    `SELECT model_version, indicator_code, flow, value
       FROM c
      WHERE model_version = $1
        AND indicator_code = $2
      ORDER BY flow ASC`,
    [modelVersion, indicatorCode]
  );
  return res.rows.map(mapCharacterizationFactor);
}

/**
 * Characterization factors of one model version (the active one unless
 * given), each joined to the GWP reference of its implied gas for the given
 * AR version. An exact gas name match is preferred; otherwise a gas name
 * that is the implied name followed by a qualifier, such as
 * "Methane – non-fossil" for "Methane", is used. Among several qualified
 * names, the one whose GWP equals the flow's factor wins, then a
 * non-fossil qualifier, then the alphabetically first.
 */
export async function resolveFlowFactors(
  db: SqlExecutor,
  options: { arVersion: string; indicatorCode?: string; modelVersion?: string }
): Promise<ResolvedFlowFactor[]> {
  const modelVersion = options.modelVersion ?? (await getActiveModelMetadata(db))?.modelVersion;
  if (!modelVersion) {
    return [];
  }

  const res = await db.query<ResolvedFlowFactorRow>(
    `SELECT f.model_version, f.indicator_code, f.flow, f.value, f.implied_gas_name,
            g.gas_name, g.gwp_value, g.gwp_display, g.category
       FROM (
              SELECT model_version, indicator_code, flow, value,
                     btrim(split_part(flow, '/', 1)) AS implied_gas_name
                FROM c
               WHERE model_version = $1
                 AND ($3::text IS NULL OR indicator_code = $3::text)
            ) f
       LEFT JOIN LATERAL (
              SELECT r.gas_name, r.gwp_value, r.gwp_display, r.category
                FROM ipcc_ar_gwp r
               WHERE r.ar_version = $2
                 AND (
                       r.gas_name = f.implied_gas_name
                       OR left(r.gas_name, length(f.implied_gas_name) + 1) = f.implied_gas_name || ' '
                     )
               ORDER BY (r.gas_name = f.implied_gas_name) DESC,
                        COALESCE(r.gwp_value = f.value, false) DESC,
                        (position('non-fossil' in r.gas_name) > 0) DESC,
                        r.gas_name ASC
               LIMIT 1
            ) g ON true
      ORDER BY f.indicator_code ASC, f.flow ASC`,
    [modelVersion, options.arVersion, options.indicatorCode ?? null]
  );

  return res.rows.map((row) => ({
    ...mapCharacterizationFactor(row),
    impliedGasName: row.implied_gas_name,
    gwp: row.gas_name === null
      ? null
      : {
          gasName: row.gas_name,
          arVersion: options.arVersion,
          gwpValue: toNullableNumber(row.gwp_value),
          gwpDisplay: row.gwp_display ?? null,
          category: row.category ?? null
        }
  }));
}
