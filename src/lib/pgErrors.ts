export type ConstraintKind = 'unique' | 'foreignKey' | 'check' | 'notNull';

type PgError = {
  code: string;
  table: string | null;
  column: string | null;
  constraint: string | null;
  detail: string | null;
  message: string;
};

const CONSTRAINT_KIND_BY_SQLSTATE: Record<string, ConstraintKind> = {
  '23505': 'unique',
  '23503': 'foreignKey',
  '23514': 'check',
  '23502': 'notNull'
};

const ERROR_CODE_BY_KIND: Record<ConstraintKind, string> = {
  unique: 'STORE_UNIQUE_VIOLATION',
  foreignKey: 'STORE_FOREIGN_KEY_VIOLATION',
  check: 'STORE_CHECK_VIOLATION',
  notNull: 'STORE_NOT_NULL_VIOLATION'
};

function stringField(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Reads the fields `pg` (and PGlite, which uses the same protocol messages)
 * attach to server errors. Returns null for anything that is not one.
 */
export function readPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object' || !('code' in err)) {
    return null;
  }
  const code = stringField(err.code);
  if (!code) {
    return null;
  }
  return {
    code,
    table: 'table' in err ? stringField(err.table) : null,
    column: 'column' in err ? stringField(err.column) : null,
    constraint: 'constraint' in err ? stringField(err.constraint) : null,
    detail: 'detail' in err ? stringField(err.detail) : null,
    message: err instanceof Error ? err.message : code
  };
}

export function classifyPgError(err: unknown): ConstraintKind | null {
  const pgErr = readPgError(err);
  if (!pgErr) {
    return null;
  }
  return CONSTRAINT_KIND_BY_SQLSTATE[pgErr.code] ?? null;
}

export class StoreConstraintError extends Error {
  readonly kind: ConstraintKind;
  readonly code: string;
  readonly sqlState: string;
  readonly table: string | null;
  readonly column: string | null;
  readonly constraint: string | null;
  readonly detail: string | null;

  constructor(kind: ConstraintKind, pgErr: PgError, cause: unknown) {
    const code = ERROR_CODE_BY_KIND[kind];
    super(`${code} table=${pgErr.table ?? 'unknown'} ${pgErr.message}`, { cause });
    this.name = 'StoreConstraintError';
    this.kind = kind;
    this.code = code;
    this.sqlState = pgErr.code;
    this.table = pgErr.table;
    this.column = pgErr.column;
    this.constraint = pgErr.constraint;
    this.detail = pgErr.detail;
  }
}

/**
 * Constraint violations become StoreConstraintError; every other error is
 * returned unchanged so callers can rethrow it as-is.
 */
export function toStoreError(err: unknown): unknown {
  const pgErr = readPgError(err);
  if (!pgErr) {
    return err;
  }
  const kind = classifyPgError(err);
  return kind ? new StoreConstraintError(kind, pgErr, err) : err;
}

export async function mapConstraintErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    throw toStoreError(err);
  }
}
