import type { SqlExecutor } from '../db';
import { mapConstraintErrors } from '../lib/pgErrors';

export interface ModelMetadata {
  modelVersion: string;
  economicYear: number | null;
  satelliteYearMin: number | null;
  satelliteYearMax: number | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type ModelMetadataInput = {
  modelVersion: string;
  economicYear?: number | null;
  satelliteYearMin?: number | null;
  satelliteYearMax?: number | null;
  /** Omitted: new rows take the column default, existing rows keep their flag. */
  isActive?: boolean;
};

type ModelMetadataRow = {
  model_version: string;
  economic_year: number | null;
  satellite_year_min: number | null;
  satellite_year_max: number | null;
  is_active: boolean;
  created_at: Date | string;
  updated_at: Date | string;
};

const MODEL_METADATA_COLUMNS = `model_version, economic_year, satellite_year_min, satellite_year_max,
       is_active, created_at, updated_at`;

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

function mapModelMetadata(row: ModelMetadataRow): ModelMetadata {
  return {
    modelVersion: row.model_version,
    economicYear: row.economic_year ?? null,
    satelliteYearMin: row.satellite_year_min ?? null,
    satelliteYearMax: row.satellite_year_max ?? null,
    isActive: row.is_active,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at)
  };
}

/**
 * Inserts or updates one model version by primary key. updated_at is left to
 * the column default on insert and to the trigger on update.
 */
export async function upsertModelMetadata(db: SqlExecutor, input: ModelMetadataInput): Promise<ModelMetadata> {
  const res = await mapConstraintErrors(() =>
    db.query<ModelMetadataRow>(
      `INSERT INTO model_metadata (model_version, economic_year, satellite_year_min, satellite_year_max, is_active)
       VALUES ($1, $2, $3, $4, COALESCE($5::boolean, false))
       ON CONFLICT (model_version) DO UPDATE
          SET economic_year = EXCLUDED.economic_year,
              satellite_year_min = EXCLUDED.satellite_year_min,
              satellite_year_max = EXCLUDED.satellite_year_max,
              is_active = COALESCE($5::boolean, model_metadata.is_active)
       RETURNING ${MODEL_METADATA_COLUMNS}`,
      [
        input.modelVersion,
        input.economicYear ?? null,
        input.satelliteYearMin ?? null,
        input.satelliteYearMax ?? null,
        input.isActive ?? null
      ]
    )
  );
  return mapModelMetadata(res.rows[0]);
}

/**
 * Upserts the version as active and clears the flag on every other version,
 * in one transaction. The table itself allows several active rows; this is
 * the rule the loader applies.
 */
export async function activateModelVersion(
  db: SqlExecutor,
  input: Omit<ModelMetadataInput, 'isActive'>
): Promise<{ model: ModelMetadata; deactivated: string[] }> {
  return db.transaction(async (tx) => {
    const model = await upsertModelMetadata(tx, { ...input, isActive: true });
    const res = await tx.query<{ model_version: string }>(
      `UPDATE model_metadata
          SET is_active = false
        WHERE model_version <> $1
          AND is_active
        RETURNING model_version`,
      [input.modelVersion]
    );
    return {
      model,
      deactivated: res.rows.map((row) => row.model_version).sort((a, b) => a.localeCompare(b))
    };
  });
}

export async function getModelMetadata(db: SqlExecutor, modelVersion: string): Promise<ModelMetadata | null> {
  const res = await db.query<ModelMetadataRow>(
    `SELECT ${MODEL_METADATA_COLUMNS}
       FROM model_metadata
      WHERE model_version = $1`,
    [modelVersion]
  );
  if (res.rows.length === 0) return null;
  return mapModelMetadata(res.rows[0]);
}

/**
 * The row a consumer should treat as current. When more than one row is
 * flagged, the most recently updated one wins.
 */
export async function getActiveModelMetadata(db: SqlExecutor): Promise<ModelMetadata | null> {
  const res = await db.query<ModelMetadataRow>(
    `SELECT ${MODEL_METADATA_COLUMNS}
       FROM model_metadata
      WHERE is_active
      ORDER BY updated_at DESC, model_version DESC
      LIMIT 1`
  );
  if (res.rows.length === 0) return null;
  return mapModelMetadata(res.rows[0]);
}

export async function listModelMetadata(db: SqlExecutor): Promise<ModelMetadata[]> {
  const res = await db.query<ModelMetadataRow>(
    `SELECT ${MODEL_METADATA_COLUMNS}
       FROM model_metadata
      ORDER BY model_version ASC`
  );
  return res.rows.map(mapModelMetadata);
}

function formatYearRange(min: number | null, max: number | null): string | null {
  if (min === null && max === null) return null;
  if (min === null || max === null || min === max) return String(min ?? max);
  return `${min} to ${max}`;
}

/**
 * The "Methodology" sentence a UI shows for the active model, e.g.
 * `USEEIO model v2.1 uses 2018 economic data with satellite data from 2015 to 2020.`
 */
export function describeMethodology(model: ModelMetadata): string {
  const parts: string[] = [];
  if (model.economicYear !== null) {
    parts.push(`${model.economicYear} economic data`);
  }
  const satelliteRange = formatYearRange(model.satelliteYearMin, model.satelliteYearMax);
  if (satelliteRange) {
    parts.push(`satellite data from ${satelliteRange}`);
  }
  if (parts.length === 0) {
    return `USEEIO model ${model.modelVersion}.`;
  }
  return `USEEIO model ${model.modelVersion} uses ${parts.join(' with ')}.`;
}
