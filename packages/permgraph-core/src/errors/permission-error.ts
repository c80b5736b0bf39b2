/**
 * Permission engine error codes
 */
export type PermissionErrorCode = 'INVALID_ARGUMENT' | 'INVALID_CONTEXT' | 'INVALID_DURATION';

/**
 * Raised only for invalid input at a construction or resolver boundary.
 * Missing data and unmatched permissions are never errors.
 */
export class PermissionError extends Error {
  constructor(
    message: string,
    public readonly code: PermissionErrorCode
  ) {
    super(message);
    this.name = 'PermissionError';
  }
}

/**
 * Throw INVALID_ARGUMENT unless value is a non-empty string
 */
export function requireNonEmptyString(value: unknown, name: string): string {
  if (typeof value !== 'string') {
    throw new PermissionError(`${name} must be a string`, 'INVALID_ARGUMENT');
  }
  if (value.length === 0) {
    throw new PermissionError(`${name} cannot be empty`, 'INVALID_ARGUMENT');
  }
  return value;
}
