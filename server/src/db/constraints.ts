import Database from 'better-sqlite3';

/**
 * True when a statement failed on a UNIQUE index, e.g. a row inserted by
 * another request or process after this one checked for it.
 */
export function isUniqueConstraintError(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}
