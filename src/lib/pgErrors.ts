export type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type HttpErrorResponse = { status: number; body: Record<string, unknown> };

export type PgErrorMapping = {
  unique?: (err: PgError) => HttpErrorResponse | null;
  foreignKey?: (err: PgError) => HttpErrorResponse | null;
  check?: (err: PgError) => HttpErrorResponse | null;
  notNull?: (err: PgError) => HttpErrorResponse | null;
};

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_CHECK_VIOLATION = '23514';
export const PG_NOT_NULL_VIOLATION = '23502';

export function asPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object') {
    return null;
  }
  return {
    code: 'code' in err && typeof err.code === 'string' ? err.code : undefined,
    constraint: 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined,
    detail: 'detail' in err && typeof err.detail === 'string' ? err.detail : undefined
  };
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  const pgErr = asPgError(err);
  if (!pgErr || pgErr.code !== PG_UNIQUE_VIOLATION) return false;
  if (constraint && pgErr.constraint && pgErr.constraint !== constraint) return false;
  return true;
}

/**
 * Maps Postgres errors to HTTP responses while preserving per-route semantics.
 *
 * No default messages: callers supply the bodies through the mapping callbacks.
 */
export function mapPgErrorToHttp(err: unknown, mapping: PgErrorMapping): HttpErrorResponse | null {
  const pgErr = asPgError(err);
  if (!pgErr) {
    return null;
  }
  switch (pgErr.code) {
    case PG_UNIQUE_VIOLATION:
      return mapping.unique?.(pgErr) ?? null;
    case PG_FOREIGN_KEY_VIOLATION:
      return mapping.foreignKey?.(pgErr) ?? null;
    case PG_CHECK_VIOLATION:
      return mapping.check?.(pgErr) ?? null;
    case PG_NOT_NULL_VIOLATION:
      return mapping.notNull?.(pgErr) ?? null;
    default:
      return null;
  }
}
