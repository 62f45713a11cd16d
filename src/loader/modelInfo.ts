import path from 'node:path';
import { parseYear } from '../lib/numbers';
import { SHEET, type WorkbookExports } from './workbookExports';

export type ModelYears = {
  economicYear: number | null;
  satelliteYearMin: number | null;
  satelliteYearMax: number | null;
};

const ECONOMIC_YEAR_HEADERS = ['year', 'economic year', 'economic_year'];

/**
 * "USEEIOv2.1" -> "2.1"; "USEEIO_v2.6.0-beta.xlsx" -> "2.6.0-beta".
 * A trailing file extension is dropped, version-like suffixes such as ".1" are not.
 */
export function deriveModelVersion(fileOrDirName: string): string {
  const base = path.basename(fileOrDirName.trim());
  const extension = path.extname(base);
  const stem = /^\.[A-Za-z]\w*$/.test(extension) ? base.slice(0, -extension.length) : base;
  const version = stem.replace(/^USEEIO/, '').replace(/^[v_-]+/, '').trim();
  return version || 'unknown';
}

/**
 * Economic year: the first numeric value of the demands sheet's year column.
 * Satellite range: min/max of the numeric Rho headers after the sector column.
 */
export function detectModelYears(exports: WorkbookExports): ModelYears {
  let economicYear: number | null = null;
  const demands = exports[SHEET.DEMANDS];
  if (demands) {
    const yearIdx = demands.headers.findIndex((header) => ECONOMIC_YEAR_HEADERS.includes(header.trim().toLowerCase()));
    if (yearIdx >= 0) {
      for (const row of demands.rows) {
        const year = parseYear(row[yearIdx]);
        if (year !== null) {
          economicYear = year;
          break;
        }
      }
    }
  }

  const rho = exports[SHEET.RHO];
  const years = (rho?.headers.slice(1) ?? [])
    .map((header) => parseYear(header))
    .filter((year): year is number => year !== null);

  return {
    economicYear,
    satelliteYearMin: years.length > 0 ? Math.min(...years) : null,
    satelliteYearMax: years.length > 0 ? Math.max(...years) : null
  };
}
