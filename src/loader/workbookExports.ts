import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parseCsv } from '../lib/csv';

export const SHEET = {
  CHARACTERIZATION: 'C',
  RHO: 'Rho',
  DEMANDS: 'demands',
  INDICATORS: 'indicators'
} as const;

export type SheetName = (typeof SHEET)[keyof typeof SHEET];

export type WorkbookSheet = {
  name: SheetName;
  headers: string[];
  rows: string[][];
};

/** A workbook exported sheet-by-sheet to `<sheet>.csv` files; absent sheets are null. */
export type WorkbookExports = Record<SheetName, WorkbookSheet | null>;

export function parseWorkbookSheet(name: SheetName, csvText: string): WorkbookSheet {
  const { headers, rows } = parseCsv(csvText);
  return { name, headers, rows };
}

/**
 * Reads the sheets the loader needs from a directory of CSV exports. Sheet
 * files are matched case-insensitively, as sheet names are in the workbook.
 */
export async function readWorkbookExports(exportDir: string): Promise<WorkbookExports> {
  const entries = await readdir(exportDir, { withFileTypes: true });
  const files = new Map(
    entries.filter((entry) => entry.isFile()).map((entry) => [entry.name.toLowerCase(), entry.name])
  );

  const readSheet = async (name: SheetName): Promise<WorkbookSheet | null> => {
    const fileName = files.get(`${name.toLowerCase()}.csv`);
    if (!fileName) return null;
    const text = await readFile(path.join(exportDir, fileName), 'utf8');
    return parseWorkbookSheet(name, text);
  };

  const [c, rho, demands, indicators] = await Promise.all([
    readSheet(SHEET.CHARACTERIZATION),
    readSheet(SHEET.RHO),
    readSheet(SHEET.DEMANDS),
    readSheet(SHEET.INDICATORS)
  ]);

  return {
    [SHEET.CHARACTERIZATION]: c,
    [SHEET.RHO]: rho,
    [SHEET.DEMANDS]: demands,
    [SHEET.INDICATORS]: indicators
  };
}
