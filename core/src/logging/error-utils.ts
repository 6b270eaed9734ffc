/**
 * Error Utilities
 *
 * Classification of Node system errors and safe message extraction.
 */

/**
 * Read the `code` property of a Node system error, if it has a string one.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Check if an error is a "file not found" error (ENOENT).
 * spawn reports a missing executable the same way.
 */
export function isNotFoundError(err: unknown): boolean {
  return getErrorCode(err) === "ENOENT";
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  return String(err);
}
