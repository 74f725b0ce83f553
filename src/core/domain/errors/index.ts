/**
 * Domain Errors
 *
 * Every failure raised by the persistence layer is a PersistenceError.
 * The underlying driver or filesystem error, when there is one, travels as `cause`.
 */

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/**
 * Human-readable description of an unknown thrown value, for log context.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
