/** Constructor of an error class, used as the lookup key when walking cause chains. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Set `shallow` to only inspect the outermost error.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): T | null {
  const visited = new Set<Error>();
  let current: unknown = err;

  while (current instanceof Error && !visited.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    if (shallow) {
      return null;
    }

    visited.add(current);
    current = current.cause;
  }

  return null;
}
