/**
 * Converts the driver's representation of a numeric column into a number.
 *
 * `numeric` arrives as a string from both `pg` and PGlite; integers and
 * floats arrive as numbers.
 * - number => itself
 * - string => parseFloat (NaN => 0)
 * - null/undefined => 0
 * - other => Number(value) (NaN => 0)
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isNaN(num) ? 0 : num;
}

/** Like toNumber, but SQL NULL stays null. */
export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  return toNumber(value);
}

/**
 * Parses a spreadsheet cell that should hold a number. Blank and
 * non-numeric cells yield null.
 */
export function parseNumericCell(value: string | undefined): number | null {
  const trimmed = (value ?? '').trim();
  if (trimmed === '') {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Year headers and cells may be exported as "2018" or "2018.0". */
export function parseYear(value: string | undefined): number | null {
  const parsed = parseNumericCell(value);
  return parsed === null ? null : Math.trunc(parsed);
}
