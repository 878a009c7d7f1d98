/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (e: unknown)` blocks.
 */

/**
 * Check if a value is a Node.js ErrnoException
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Extract a human-readable error message from an unknown error.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === 'string') {
    return e;
  }
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

/**
 * Check if an error has a specific code (common for Node.js errors)
 */
export function hasErrorCode(e: unknown, code: string): boolean {
  return isNodeError(e) && e.code === code;
}

export function isNotFoundError(e: unknown): boolean {
  return hasErrorCode(e, 'ENOENT');
}

export function isFileExistsError(e: unknown): boolean {
  return hasErrorCode(e, 'EEXIST');
}
