const UNIQUE_VIOLATION = '23505';

/** True for a pg `DatabaseError` raised by a unique constraint. */
export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}
