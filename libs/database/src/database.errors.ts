import { QueryFailedError } from 'typeorm';

/** PostgreSQL SQLSTATE for unique_violation */
const UNIQUE_VIOLATION = '23505';

/** string_data_right_truncation, untranslatable_character */
const UNSTORABLE_VALUE = new Set(['22001', '22P05']);

function driverErrorOf(err: unknown): object | null {
  if (!(err instanceof QueryFailedError)) {
    return null;
  }
  const driverError: unknown = err.driverError;
  return typeof driverError === 'object' && driverError !== null
    ? driverError
    : null;
}

function sqlState(driverError: object): unknown {
  return 'code' in driverError ? driverError.code : undefined;
}

/**
 * True when `err` is a PostgreSQL unique violation, optionally on the
 * named constraint.
 */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  const driverError = driverErrorOf(err);
  if (!driverError || sqlState(driverError) !== UNIQUE_VIOLATION) {
    return false;
  }

  if (constraint === undefined) {
    return true;
  }
  return 'constraint' in driverError && driverError.constraint === constraint;
}

/**
 * True when PostgreSQL refused a value the column cannot hold: a string
 * over its `varchar` length, or text the database encoding cannot store.
 */
export function isUnstorableValue(err: unknown): boolean {
  const driverError = driverErrorOf(err);
  if (!driverError) {
    return false;
  }
  const code = sqlState(driverError);
  return typeof code === 'string' && UNSTORABLE_VALUE.has(code);
}
