import { normalizeHeader } from '../lib/csv';
import { parseNumericCell } from '../lib/numbers';
import type { CharacterizationFactor } from '../services/characterization.service';
import type { WorkbookSheet } from './workbookExports';

/**
 * Row position -> indicator code, from the indicators sheet. An `Index`
 * column, when present, supplies the position; otherwise the row order does.
 */
export function buildIndexToCode(indicators: WorkbookSheet | null): Map<number, string> {
  const mapping = new Map<number, string>();
  if (!indicators) return mapping;

  const headers = indicators.headers.map(normalizeHeader);
  const codeIdx = headers.indexOf('code');
  const indexIdx = headers.indexOf('index');
  if (codeIdx < 0) return mapping;

  indicators.rows.forEach((row, position) => {
    const code = (row[codeIdx] ?? '').trim();
    if (!code) return;
    const explicitIndex = indexIdx >= 0 ? parseNumericCell(row[indexIdx]) : null;
    mapping.set(explicitIndex ?? position, code);
  });
  return mapping;
}

function looksNumeric(value: string): boolean {
  const stripped = value.replace(/[.-]/g, '');
  return stripped.length > 0 && /^\d+$/.test(stripped);
}

/**
 * Turns sheet C (one row per indicator, one column per flow) into long rows.
 * The first column names the indicator unless it is blank or numeric, in
 * which case the indicators sheet is consulted by row position. Rows with no
 * resolvable code and blank or non-numeric cells are skipped.
 */
export function meltCharacterizationMatrix(
  sheet: WorkbookSheet,
  modelVersion: string,
  indexToCode: Map<number, string> = new Map()
): CharacterizationFactor[] {
  const flows = sheet.headers.slice(1).map((header) => header.trim());
  const factors: CharacterizationFactor[] = [];

  sheet.rows.forEach((row, position) => {
    const label = (row[0] ?? '').trim();
    const indicatorCode = label && !looksNumeric(label) ? label : indexToCode.get(position);
    if (!indicatorCode) return;

    flows.forEach((flow, flowIdx) => {
      if (!flow) return;
      const value = parseNumericCell(row[flowIdx + 1]);
      if (value === null) return;
      factors.push({ modelVersion, indicatorCode, flow, value });
    });
  });

  return factors;
}
