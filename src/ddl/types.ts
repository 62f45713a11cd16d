/**
 * DDL for one table, as single statements so that any client can run them
 * one at a time (PGlite's extended protocol rejects multi-statement strings).
 */
export type TableDdl = {
  table: string;
  /** Every statement is guarded, so replaying the list is a no-op. */
  create: readonly string[];
  drop: readonly string[];
};
