/**
 * AWS SDK v3 service exceptions are matched by name so callers need not import each
 * client's exception classes.
 */
export function isAwsErrorNamed(error: unknown, ...names: string[]): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'name' in error &&
    typeof error.name === 'string' &&
    names.includes(error.name)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
