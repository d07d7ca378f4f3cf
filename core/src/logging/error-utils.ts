/**
 * Error Utilities
 *
 * Safe error classification and message extraction.
 */

function errorCode(err: unknown): unknown {
  if (err && typeof err === "object" && "code" in err) {
    return err.code;
  }
  return undefined;
}

/**
 * Check if an error is a "file not found" error (ENOENT).
 */
export function isNotFoundError(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

/**
 * Check if an error is a permission error (EACCES or EPERM).
 */
export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EACCES" || code === "EPERM";
}

/**
 * Check if an error is an "already exists" error (EEXIST).
 */
export function isAlreadyExistsError(err: unknown): boolean {
  return errorCode(err) === "EEXIST";
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
