import type { SqlExecutor } from '../db';
import defaultGwpRows from '../data/ipccArGwp.json';
import { mapConstraintErrors } from '../lib/pgErrors';
import { toNullableNumber } from '../lib/numbers';
import { chunk, valuesPlaceholders } from '../lib/sql';
import { gwpReferenceListSchema, type GwpReferenceInput } from '../schemas/gwpReference.schema';

export interface GwpReference {
  gasName: string;
  arVersion: string;
  gwpValue: number | null;
  gwpDisplay: string | null;
  category: string | null;
}

type GwpReferenceRow = {
  gas_name: string;
  ar_version: string;
  gwp_value: string | number | null;
  gwp_display: string | null;
  category: string | null;
};

// Footnote markers the source spreadsheet appended to some gas names.
const LEGACY_GAS_NAME_SUFFIXES = [' a', ' b', ' c'] as const;

const UPSERT_BATCH_SIZE = 500;

function mapGwpReference(row: GwpReferenceRow): GwpReference {
  return {
    gasName: row.gas_name,
    arVersion: row.ar_version,
    gwpValue: toNullableNumber(row.gwp_value),
    gwpDisplay: row.gwp_display ?? null,
    category: row.category ?? null
  };
}

export function normalizeGasName(name: string): string {
  const trimmed = name.trim();
  const suffix = LEGACY_GAS_NAME_SUFFIXES.find((candidate) => trimmed.endsWith(candidate));
  return suffix ? trimmed.slice(0, -suffix.length) : trimmed;
}

/** Reference rows shipped with the project, validated on every call. */
export function getDefaultGwpReferences(): GwpReference[] {
  return gwpReferenceListSchema.parse(defaultGwpRows).map(toGwpReference);
}

function toGwpReference(input: GwpReferenceInput): GwpReference {
  return {
    gasName: normalizeGasName(input.gasName),
    arVersion: input.arVersion.trim(),
    gwpValue: input.gwpValue,
    gwpDisplay: input.gwpDisplay ?? null,
    category: input.category ?? null
  };
}

/**
 * Refreshes the reference table: legacy suffixed gas names are removed, then
 * every row is upserted by (gas_name, ar_version). When the input repeats a
 * key after normalisation, the last occurrence wins.
 */
export async function upsertGwpReferences(db: SqlExecutor, inputs: readonly GwpReferenceInput[]): Promise<number> {
  const byKey = new Map<string, GwpReference>();
  for (const input of inputs) {
    const reference = toGwpReference(input);
    byKey.set(JSON.stringify([reference.gasName, reference.arVersion]), reference);
  }
  const references = Array.from(byKey.values());

  return db.transaction(async (tx) => {
    for (const suffix of LEGACY_GAS_NAME_SUFFIXES) {
      await tx.query(`DELETE FROM ipcc_ar_gwp WHERE gas_name LIKE $1`, [`%${suffix}`]);
    }

    for (const batch of chunk(references, UPSERT_BATCH_SIZE)) {
      const params = batch.flatMap((ref) => [ref.gasName, ref.arVersion, ref.gwpValue, ref.gwpDisplay, ref.category]);
      await mapConstraintErrors(() =>
        tx.query(
          `INSERT INTO ipcc_ar_gwp (gas_name, ar_version, gwp_value, gwp_display, category)
           VALUES ${valuesPlaceholders(batch.length, 5)}
           ON CONFLICT (gas_name, ar_version) DO UPDATE
              SET gwp_value = EXCLUDED.gwp_value,
                  gwp_display = EXCLUDED.gwp_display,
                  category = EXCLUDED.category`,
          params
        )
      );
    }
    return references.length;
  });
}

export async function getGwpReference(
  db: SqlExecutor,
  gasName: string,
  arVersion: string
): Promise<GwpReference | null> {
  const res = await db.query<GwpReferenceRow>(
    `SELECT gas_name, ar_version, gwp_value, gwp_display, category
       FROM ipcc_ar_gwp
      WHERE gas_name = $1
        AND ar_version = $2`,
    [gasName.trim(), arVersion.trim()]
  );
  if (res.rows.length === 0) return null;
  return mapGwpReference(res.rows[0]);
}

export async function listGwpReferences(
  db: SqlExecutor,
  filters: { arVersion?: string; category?: string } = {}
): Promise<GwpReference[]> {
  const clauses: string[] = [];
  const params: unknown[] = [];
  if (filters.arVersion) {
    params.push(filters.arVersion);
    clauses.push(`ar_version = $${params.length}`);
  }
  if (filters.category) {
    params.push(filters.category);
    clauses.push(`category = $${params.length}`);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  const res = await db.query<GwpReferenceRow>(
    `SELECT gas_name, ar_version, gwp_value, gwp_display, category
       FROM ipcc_ar_gwp
       ${where}
      ORDER BY gas_name ASC, ar_version ASC`,
    params
  );
  return res.rows.map(mapGwpReference);
}

/** What to show for a factor: the number when known, else the source's bound such as "<1". */
export function formatGwp(reference: Pick<GwpReference, 'gwpValue' | 'gwpDisplay'>): string | null {
  if (reference.gwpValue !== null) {
    return String(reference.gwpValue);
  }
  return reference.gwpDisplay ?? null;
}
