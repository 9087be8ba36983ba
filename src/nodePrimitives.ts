/**
 * Lightweight representation of an errno-flavoured error. Only the properties
 * inspected by the runner and the filesystem helpers are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Returns the errno code (`ENOENT`, `EACCES`, ...) attached to a thrown value. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Message of a thrown value, whatever was thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
