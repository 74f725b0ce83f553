/**
 * Database Driver Port
 *
 * Secondary port over a raw relational driver. One DriverConnection carries
 * one transaction at a time; statements are prepared, bound, executed and
 * closed on that connection.
 */

import type { SqlValue } from "../domain/value-objects/sql-value.js";

export interface ConnectionOptions {
  url: string;
  username: string;
  password: string;
}

export interface PrepareOptions {
  /** Ask the driver to expose keys generated by an INSERT. */
  returnGeneratedKeys: boolean;
}

/** Fully materialized driver rows; values are positional, matching `columns`. */
export interface DriverResultSet {
  columns: string[];
  rows: unknown[][];
}

export interface DriverOutcome {
  /** Present when the statement produced a result set (SELECT, user-written RETURNING). */
  resultSet: DriverResultSet | null;
  updateCount: number;
  generatedKeys: DriverResultSet;
}

export interface DriverStatement {
  /** Bind a positional parameter; `index` starts at 1. */
  bind(index: number, value: SqlValue): void;
  execute(): Promise<DriverOutcome>;
  close(): Promise<void>;
}

export interface DriverConnection {
  /** Turn autocommit off: everything until commit/rollback is one transaction. */
  begin(): Promise<void>;
  prepare(sql: string, options: PrepareOptions): Promise<DriverStatement>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export interface DatabaseDriver {
  readonly name: string;
  connect(options: ConnectionOptions): Promise<DriverConnection>;
}

export interface DriverResolver {
  resolve(identifier: string): DatabaseDriver | undefined;
}

export function emptyResultSet(): DriverResultSet {
  return { columns: [], rows: [] };
}
