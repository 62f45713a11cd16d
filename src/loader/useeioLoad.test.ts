import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { USEEIO_LOAD_EVENT, type UseeioLoadLogger } from '../observability/useeioLoad.events';
import { insertCharacterizationFactors, resolveFlowFactors } from '../services/characterization.service';
import { activateModelVersion, listModelMetadata } from '../services/modelMetadata.service';
import type { GwpReferenceInput } from '../schemas/gwpReference.schema';
import { createTestDatabase, type TestDatabase } from '../testing/pglite';
import { runUseeioLoad } from './useeioLoad';
import { parseWorkbookSheet, SHEET, type WorkbookExports } from './workbookExports';

const EXPORT_DIR = '/exports/USEEIOv2.1';

const GWP_REFERENCES: GwpReferenceInput[] = [
  { gasName: 'Methane (non-fossil)', arVersion: 'AR5', gwpValue: 28, category: 'Major GHG' }
];

function workbook(characterization: string | null): WorkbookExports {
  return {
    [SHEET.CHARACTERIZATION]:
      characterization === null ? null : parseWorkbookSheet(SHEET.CHARACTERIZATION, characterization),
    [SHEET.RHO]: parseWorkbookSheet(SHEET.RHO, 'Sector,2015,2020\n1111A0,1,1\n'),
    [SHEET.DEMANDS]: parseWorkbookSheet(SHEET.DEMANDS, 'Sector,Year,Value\n1111A0,2018,1\n'),
    [SHEET.INDICATORS]: parseWorkbookSheet(SHEET.INDICATORS, 'Code,Name\nGWP,Global warming\n')
  };
}

const MATRIX = 'Indicator,Methane/emission/air/kg,Nitrous oxide/emission/air/kg\nGWP,28,265\n';

function clock(...ticks: number[]) {
  const now = vi.fn<() => number>();
  for (const tick of ticks) now.mockReturnValueOnce(tick);
  return now;
}

describe('runUseeioLoad', () => {
  let database: TestDatabase;

  beforeAll(async () => {
    database = await createTestDatabase();
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await database.reset();
  });

  it('replaces the model version and reports each step', async () => {
    await activateModelVersion(database.db, { modelVersion: 'v2.0' });
    await insertCharacterizationFactors(database.db, [
      { modelVersion: 'v2.1', indicatorCode: 'GWP', flow: 'Stale/emission/air/kg', value: 1 }
    ]);
    const logger = vi.fn<UseeioLoadLogger>();

    const summary = await runUseeioLoad(database.db, {
      exportDir: EXPORT_DIR,
      modelVersion: 'v2.1',
      exports: workbook(MATRIX),
      gwpReferences: GWP_REFERENCES,
      logger,
      now: clock(1000, 1250)
    });

    expect(summary).toEqual({
      modelVersion: 'v2.1',
      economicYear: 2018,
      satelliteYearMin: 2015,
      satelliteYearMax: 2020,
      clearedCharacterizationRows: 1,
      deactivatedVersions: ['v2.0'],
      gwpReferenceRows: 1,
      characterizationRows: 2
    });
    expect(logger.mock.calls).toEqual([
      [
        USEEIO_LOAD_EVENT.STARTED,
        {
          modelVersion: 'v2.1',
          exportDir: EXPORT_DIR,
          economicYear: 2018,
          satelliteYearMin: 2015,
          satelliteYearMax: 2020
        }
      ],
      [USEEIO_LOAD_EVENT.MODEL_VERSION_CLEARED, { modelVersion: 'v2.1', characterizationRows: 1, modelMetadataRows: 0 }],
      [USEEIO_LOAD_EVENT.MODEL_METADATA_LOADED, { modelVersion: 'v2.1', deactivatedVersions: ['v2.0'] }],
      [USEEIO_LOAD_EVENT.GWP_REFERENCES_LOADED, { modelVersion: 'v2.1', rows: 1 }],
      [USEEIO_LOAD_EVENT.CHARACTERIZATION_LOADED, { modelVersion: 'v2.1', rows: 2 }],
      [
        USEEIO_LOAD_EVENT.COMPLETED,
        { modelVersion: 'v2.1', gwpReferenceRows: 1, characterizationRows: 2, durationMs: 250 }
      ]
    ]);

    const resolved = await resolveFlowFactors(database.db, { arVersion: 'AR5' });
    expect(resolved.map((row) => [row.flow, row.value, row.gwp?.gwpValue ?? null])).toEqual([
      ['Methane/emission/air/kg', 28, 28],
      ['Nitrous oxide/emission/air/kg', 265, null]
    ]);
  });

  it('can be run again for the same version', async () => {
    const options = {
      exportDir: EXPORT_DIR,
      modelVersion: 'v2.1',
      exports: workbook(MATRIX),
      gwpReferences: GWP_REFERENCES,
      logger: vi.fn<UseeioLoadLogger>()
    };
    await runUseeioLoad(database.db, options);

    const second = await runUseeioLoad(database.db, options);

    expect(second.clearedCharacterizationRows).toBe(2);
    expect(second.deactivatedVersions).toEqual([]);
    expect(second.characterizationRows).toBe(2);
    const models = await listModelMetadata(database.db);
    expect(models.map((model) => [model.modelVersion, model.isActive, model.economicYear])).toEqual([
      ['v2.1', true, 2018]
    ]);
  });

  it('skips the matrix when its sheet was not exported', async () => {
    const logger = vi.fn<UseeioLoadLogger>();

    const summary = await runUseeioLoad(database.db, {
      exportDir: EXPORT_DIR,
      modelVersion: 'v2.1',
      exports: workbook(null),
      gwpReferences: GWP_REFERENCES,
      logger
    });

    expect(summary.characterizationRows).toBe(0);
    expect(logger).toHaveBeenCalledWith(USEEIO_LOAD_EVENT.CHARACTERIZATION_SKIPPED, {
      modelVersion: 'v2.1',
      reason: 'SHEET_MISSING'
    });
    expect(logger).not.toHaveBeenCalledWith(USEEIO_LOAD_EVENT.CHARACTERIZATION_LOADED, expect.anything());
  });

  it('skips the matrix when it holds no factors', async () => {
    const logger = vi.fn<UseeioLoadLogger>();

    await runUseeioLoad(database.db, {
      exportDir: EXPORT_DIR,
      modelVersion: 'v2.1',
      exports: workbook('Indicator,Methane/emission/air/kg\n'),
      gwpReferences: GWP_REFERENCES,
      logger
    });

    expect(logger).toHaveBeenCalledWith(USEEIO_LOAD_EVENT.CHARACTERIZATION_SKIPPED, {
      modelVersion: 'v2.1',
      reason: 'NO_FACTORS'
    });
  });

  it('loads the shipped GWP table by default', async () => {
    const summary = await runUseeioLoad(database.db, {
      exportDir: EXPORT_DIR,
      modelVersion: 'v2.1',
      exports: workbook(MATRIX),
      logger: vi.fn<UseeioLoadLogger>()
    });

    expect(summary.gwpReferenceRows).toBe(527);
  });
});
