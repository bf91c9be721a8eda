export const PG_ERROR_CODES = {
  lockNotAvailable: '55P03',
  deadlockDetected: '40P01'
} as const;

export function pgErrorCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

/** Lock wait exceeded `lock_timeout`, or the server broke a deadlock. */
export function isLockFailure(err: unknown): boolean {
  const code = pgErrorCode(err);
  return code === PG_ERROR_CODES.lockNotAvailable || code === PG_ERROR_CODES.deadlockDetected;
}
