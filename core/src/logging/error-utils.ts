/**
 * Error Utilities
 *
 * Safe error classification and message extraction.
 */

function hasErrorCode(err: unknown, ...codes: string[]): boolean {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" && codes.includes(code);
  }
  return false;
}

/**
 * Check if an error is a "file not found" error (ENOENT).
 *
 * `spawn` reports a missing executable the same way.
 */
export function isNotFoundError(err: unknown): boolean {
  return hasErrorCode(err, "ENOENT");
}

/**
 * Check if an error is a permission error (EACCES or EPERM).
 */
export function isPermissionError(err: unknown): boolean {
  return hasErrorCode(err, "EACCES", "EPERM");
}

/**
 * Check if a file operation failed because the target already exists (EEXIST).
 */
export function isAlreadyExistsError(err: unknown): boolean {
  return hasErrorCode(err, "EEXIST");
}

/**
 * Safely extract a message string from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  return String(err);
}
