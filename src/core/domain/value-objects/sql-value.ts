/**
 * SQL Value
 *
 * Dynamically-typed carrier for bind parameters and column values.
 * Drivers hand back `unknown`; everything is normalized through toSqlValue()
 * before it reaches a MappedResult. Typed extraction is the caller's job,
 * helped by the `as*` functions below.
 */

import { PersistenceError } from "../errors/index.js";

export type SqlValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null
  | readonly SqlValue[]
  | { readonly [key: string]: SqlValue };

const NUMERIC_TEXT = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;
const INTEGER_TEXT = /^-?\d+$/;

export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;

  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (typeof value !== "object") {
    throw new PersistenceError(
      `Unsupported column value of type ${describeType(value)}`,
    );
  }

  if (value instanceof Date || value instanceof Uint8Array) return value;
  if (Array.isArray(value)) return value.map(toSqlValue);

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === Object.prototype || proto === null) {
    const record: Record<string, SqlValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      record[key] = toSqlValue(entry);
    }
    return record;
  }

  throw new PersistenceError(
    `Unsupported column value of type ${describeType(value)}`,
  );
}

export function isSqlNull(value: SqlValue): value is null {
  return value === null;
}

export function asString(value: SqlValue, label = "value"): string {
  if (typeof value === "string") return value;
  throw mismatch(label, "a string", value);
}

/**
 * Accepts numbers, safe-range bigints and numeric text (PostgreSQL returns
 * int8 and numeric columns as strings).
 */
export function asNumber(value: SqlValue, label = "value"): number {
  if (typeof value === "number") return value;
  if (
    typeof value === "bigint" &&
    value <= BigInt(Number.MAX_SAFE_INTEGER) &&
    value >= BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    return Number(value);
  }
  if (typeof value === "string" && NUMERIC_TEXT.test(value)) {
    return Number(value);
  }
  throw mismatch(label, "a number", value);
}

export function asBigInt(value: SqlValue, label = "value"): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  if (typeof value === "string" && INTEGER_TEXT.test(value)) return BigInt(value);
  throw mismatch(label, "an integer", value);
}

/**
 * SQLite stores booleans as 0/1.
 */
export function asBoolean(value: SqlValue, label = "value"): boolean {
  if (typeof value === "boolean") return value;
  if (value === 0 || value === 1) return value === 1;
  if (value === 0n || value === 1n) return value === 1n;
  throw mismatch(label, "a boolean", value);
}

export function asDate(value: SqlValue, label = "value"): Date {
  if (value instanceof Date) return value;
  if (typeof value === "string" || typeof value === "number") {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  throw mismatch(label, "a date", value);
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  if (value instanceof Uint8Array) return "bytes";
  if (typeof value === "object") {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}

function mismatch(label: string, expected: string, value: SqlValue): PersistenceError {
  return new PersistenceError(
    `Expected ${label} to be ${expected} but received ${describeType(value)}`,
  );
}
