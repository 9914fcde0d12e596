/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && isString(value.code);
}

export function isNotFound(value: unknown): boolean {
  return isErrnoException(value) && value.code === 'ENOENT';
}
