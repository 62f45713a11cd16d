/** `$1, $2, $3` for a flat parameter list. */
export function placeholders(count: number, offset = 0): string {
  return Array.from({ length: count }, (_, idx) => `$${offset + idx + 1}`).join(', ');
}

/** `($1, $2), ($3, $4)` for a multi-row VALUES clause. */
export function valuesPlaceholders(rowCount: number, columnCount: number): string {
  return Array.from({ length: rowCount }, (_, row) => `(${placeholders(columnCount, row * columnCount)})`).join(', ');
}

// Postgres caps one statement at 65535 bind parameters.
export const MAX_BIND_PARAMETERS = 65535;

export function maxRowsPerStatement(columnCount: number): number {
  return Math.floor(MAX_BIND_PARAMETERS / columnCount);
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`BATCH_SIZE_INVALID size=${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
