/**
 * SQL Executor Port
 *
 * What callers of the persistence layer depend on: single-statement execution
 * with a result mapper, and the raw transactional primitive the migration
 * runner is built on.
 */

import type { MappedResult, ResultRow } from "../domain/entities/mapped-result.js";
import type { SqlValue } from "../domain/value-objects/sql-value.js";
import type { StatementSpec } from "../domain/value-objects/statement-spec.js";

/**
 * Turns a populated result into the caller's type. Runs after commit and
 * before the connection is released; must not keep the result.
 */
export type RowMapper<T> = (result: MappedResult) => T | Promise<T>;

export interface TransactionScope {
  /** Execute one statement inside the open transaction. */
  run(sql: string, ...args: SqlValue[]): Promise<MappedResult>;
  /** Execute one statement that must produce a result set, and drain it. */
  query(sql: string, ...args: SqlValue[]): Promise<ResultRow[]>;
}

export interface StatementExecutor {
  execute<T>(spec: StatementSpec, mapper: RowMapper<T>): Promise<T>;
}

export interface TransactionRunner {
  transaction<T>(work: (tx: TransactionScope) => Promise<T>): Promise<T>;
}
