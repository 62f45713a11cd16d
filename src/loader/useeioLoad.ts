import type { SqlExecutor } from '../db';
import {
  emitUseeioLoadEvent,
  jsonLineLogger,
  USEEIO_LOAD_EVENT,
  type UseeioLoadLogger
} from '../observability/useeioLoad.events';
import {
  DEFAULT_CHARACTERIZATION_BATCH_SIZE,
  deleteModelVersion,
  insertCharacterizationFactors
} from '../services/characterization.service';
import { getDefaultGwpReferences, upsertGwpReferences } from '../services/gwpReference.service';
import { activateModelVersion } from '../services/modelMetadata.service';
import type { GwpReferenceInput } from '../schemas/gwpReference.schema';
import { buildIndexToCode, meltCharacterizationMatrix } from './characterizationMatrix';
import { detectModelYears, type ModelYears } from './modelInfo';
import { readWorkbookExports, SHEET, type WorkbookExports } from './workbookExports';

export type UseeioLoadOptions = {
  exportDir: string;
  modelVersion: string;
  batchSize?: number;
  /** Defaults to the reference table shipped in src/data. */
  gwpReferences?: readonly GwpReferenceInput[];
  /** Pre-read exports; read from exportDir when omitted. */
  exports?: WorkbookExports;
  logger?: UseeioLoadLogger;
  now?: () => number;
};

export type UseeioLoadSummary = ModelYears & {
  modelVersion: string;
  clearedCharacterizationRows: number;
  deactivatedVersions: string[];
  gwpReferenceRows: number;
  characterizationRows: number;
};

/**
 * Replaces everything stored for one model version: clears its rows, marks
 * it as the only active model, refreshes the GWP reference table and loads
 * the characterization matrix. Steps run in order; a failing step stops the
 * load and its error propagates.
 */
export async function runUseeioLoad(db: SqlExecutor, options: UseeioLoadOptions): Promise<UseeioLoadSummary> {
  const logger = options.logger ?? jsonLineLogger;
  const now = options.now ?? Date.now;
  const startedAt = now();
  const { modelVersion } = options;

  const exports = options.exports ?? (await readWorkbookExports(options.exportDir));
  const years = detectModelYears(exports);
  emitUseeioLoadEvent(USEEIO_LOAD_EVENT.STARTED, { modelVersion, exportDir: options.exportDir, ...years }, logger);

  const cleared = await deleteModelVersion(db, modelVersion);
  emitUseeioLoadEvent(USEEIO_LOAD_EVENT.MODEL_VERSION_CLEARED, { modelVersion, ...cleared }, logger);

  const { deactivated } = await activateModelVersion(db, { modelVersion, ...years });
  emitUseeioLoadEvent(
    USEEIO_LOAD_EVENT.MODEL_METADATA_LOADED,
    { modelVersion, deactivatedVersions: deactivated },
    logger
  );

  const gwpReferenceRows = await upsertGwpReferences(db, options.gwpReferences ?? getDefaultGwpReferences());
  emitUseeioLoadEvent(USEEIO_LOAD_EVENT.GWP_REFERENCES_LOADED, { modelVersion, rows: gwpReferenceRows }, logger);

  let characterizationRows = 0;
  const matrix = exports[SHEET.CHARACTERIZATION];
  if (!matrix) {
    emitUseeioLoadEvent(USEEIO_LOAD_EVENT.CHARACTERIZATION_SKIPPED, { modelVersion, reason: 'SHEET_MISSING' }, logger);
  } else {
    const factors = meltCharacterizationMatrix(matrix, modelVersion, buildIndexToCode(exports[SHEET.INDICATORS]));
    if (factors.length === 0) {
      emitUseeioLoadEvent(USEEIO_LOAD_EVENT.CHARACTERIZATION_SKIPPED, { modelVersion, reason: 'NO_FACTORS' }, logger);
    } else {
      characterizationRows = await insertCharacterizationFactors(db, factors, {
        batchSize: options.batchSize ?? DEFAULT_CHARACTERIZATION_BATCH_SIZE
      });
      emitUseeioLoadEvent(
        USEEIO_LOAD_EVENT.CHARACTERIZATION_LOADED,
        { modelVersion, rows: characterizationRows },
        logger
      );
    }
  }

  emitUseeioLoadEvent(
    USEEIO_LOAD_EVENT.COMPLETED,
    { modelVersion, gwpReferenceRows, characterizationRows, durationMs: now() - startedAt },
    logger
  );

  return {
    modelVersion,
    ...years,
    clearedCharacterizationRows: cleared.characterizationRows,
    deactivatedVersions: deactivated,
    gwpReferenceRows,
    characterizationRows
  };
}
