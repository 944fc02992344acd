const UNIQUE_VIOLATION = '23505';

/** pg surfaces constraint failures as errors carrying the SQLSTATE in `code` */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}
