/** Node system error code (ENOENT, EACCES, ...) of an unknown thrown value, if any. */
export function errorCode(error: unknown): string | null {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown';
}
