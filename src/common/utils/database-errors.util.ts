import { QueryFailedError } from 'typeorm';

/** SQLite rejected a write on a UNIQUE index or constraint. */
export function isUniqueViolation(error: unknown): boolean {
  return error instanceof QueryFailedError && error.message.includes('UNIQUE constraint failed');
}
