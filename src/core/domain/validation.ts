/**
 * Argument guards shared by the statement builders, the executor and the
 * migration runner. Types are enforced at compile time; these cover callers
 * that hand over `null` or `undefined` anyway.
 */

import { PersistenceError } from "./errors/index.js";

export function requireNonNull<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new PersistenceError(
      `The '${name}' parameter has not been initialized`,
    );
  }
  return value;
}

export function requireAtLeastOne<T>(
  values: readonly T[] | null | undefined,
  name: string,
): readonly T[] {
  const list = requireNonNull(values, name);
  if (list.length === 0) {
    throw new PersistenceError(
      `The '${name}' parameter must have at least one argument`,
    );
  }
  return list;
}

export function requireText(value: string | null | undefined, name: string): string {
  const text = requireNonNull(value, name);
  if (text.trim().length === 0) {
    throw new PersistenceError(`The '${name}' parameter must not be empty`);
  }
  return text;
}

export function hasArguments(values: readonly unknown[] | null | undefined): boolean {
  return values !== null && values !== undefined && values.length > 0;
}
