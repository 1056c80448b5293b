/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Adapters translate store failures into their module's error taxonomy.
 * - The SQLSTATE code is the stable part of a Postgres error; messages are not.
 *
 * RULES:
 * - Classification only. No AppError, no module errors, no logging.
 */

export const PG_ERROR_CODES = {
  uniqueViolation: '23505',
  notNullViolation: '23502',
  checkViolation: '23514',
  stringDataRightTruncation: '22001',
  numericValueOutOfRange: '22003',
  invalidTextRepresentation: '22P02',
} as const;

export type PgErrorClass = 'unique_violation' | 'invalid_data' | 'other';

const INVALID_DATA_CODES: ReadonlySet<string> = new Set([
  PG_ERROR_CODES.notNullViolation,
  PG_ERROR_CODES.checkViolation,
  PG_ERROR_CODES.stringDataRightTruncation,
  PG_ERROR_CODES.numericValueOutOfRange,
  PG_ERROR_CODES.invalidTextRepresentation,
]);

/**
 * Reads the SQLSTATE from a pg `DatabaseError`. Connection failures carry Node
 * errno codes (ECONNREFUSED, ...) which are not five-character SQLSTATEs.
 */
export function getPgErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;

  const { code } = err;
  return typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code) ? code : undefined;
}

/** Name of the violated constraint, when Postgres reports one. */
export function getPgConstraint(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('constraint' in err)) return undefined;

  const { constraint } = err;
  return typeof constraint === 'string' ? constraint : undefined;
}

export function classifyPgError(err: unknown): PgErrorClass {
  const code = getPgErrorCode(err);

  if (code === PG_ERROR_CODES.uniqueViolation) return 'unique_violation';
  if (code !== undefined && INVALID_DATA_CODES.has(code)) return 'invalid_data';
  return 'other';
}
