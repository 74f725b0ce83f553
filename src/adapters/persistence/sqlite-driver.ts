/**
 * SQLite Driver
 *
 * Backed by better-sqlite3. The URL may be `sqlite:<path>`, `sqlite://<path>`,
 * `file:<path>`, `:memory:` or a bare path; username and password are
 * ignored. Each connection opens its own database handle, so an in-memory
 * database does not outlive the connection.
 *
 * Statements read integers as bigints; those within the safe integer range
 * are handed on as numbers, larger ones stay bigints.
 */

import Database from "better-sqlite3";
import type {
  ConnectionOptions,
  DatabaseDriver,
  DriverConnection,
  DriverOutcome,
  DriverStatement,
} from "../../core/ports/database-driver.port.js";
import { emptyResultSet } from "../../core/ports/database-driver.port.js";
import { PersistenceError } from "../../core/domain/errors/index.js";
import type { SqlValue } from "../../core/domain/value-objects/sql-value.js";
import { bindIndex } from "./bind-index.js";

const URL_PREFIXES = ["sqlite://", "sqlite:", "file:"];

export type SqliteParameter = string | number | bigint | Buffer | null;

export interface SqliteDriverOptions {
  /** Milliseconds to wait on a locked database before failing. */
  busyTimeoutMs?: number;
}

export class SqliteDriver implements DatabaseDriver {
  readonly name = "sqlite";

  constructor(private readonly options: SqliteDriverOptions = {}) {}

  async connect(options: ConnectionOptions): Promise<DriverConnection> {
    const db = new Database(parseSqliteUrl(options.url), {
      timeout: this.options.busyTimeoutMs ?? 5000,
    });
    db.pragma("foreign_keys = ON");
    return new SqliteConnection(db);
  }
}

export class SqliteConnection implements DriverConnection {
  constructor(private readonly db: Database.Database) {}

  async begin(): Promise<void> {
    this.db.exec("BEGIN");
  }

  async prepare(sql: string): Promise<DriverStatement> {
    return new SqliteStatement(this.db.prepare(sql));
  }

  async commit(): Promise<void> {
    this.db.exec("COMMIT");
  }

  async rollback(): Promise<void> {
    // SQLite may already have rolled back on its own (e.g. after SQLITE_FULL)
    if (this.db.inTransaction) this.db.exec("ROLLBACK");
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

class SqliteStatement implements DriverStatement {
  private readonly params: SqliteParameter[] = [];

  constructor(private readonly statement: Database.Statement) {
    this.statement.safeIntegers(true);
  }

  bind(index: number, value: SqlValue): void {
    this.params[bindIndex(index)] = toSqliteParameter(value);
  }

  async execute(): Promise<DriverOutcome> {
    if (this.statement.reader) {
      const columns = this.statement.columns().map((column) => column.name);
      const rows = this.statement.raw(true).all(...this.params).map(toPositionalRow);
      return {
        resultSet: { columns, rows },
        updateCount: 0,
        generatedKeys: emptyResultSet(),
      };
    }

    const info = this.statement.run(...this.params);
    return {
      resultSet: null,
      updateCount: info.changes,
      generatedKeys:
        info.changes > 0
          ? {
              columns: ["last_insert_rowid()"],
              rows: [[fromSqliteInteger(info.lastInsertRowid)]],
            }
          : emptyResultSet(),
    };
  }

  async close(): Promise<void> {
    this.params.length = 0;
  }
}

export function parseSqliteUrl(url: string): string {
  const prefix = URL_PREFIXES.find((candidate) => url.startsWith(candidate));
  const path = prefix ? url.slice(prefix.length) : url;
  if (path.trim().length === 0) {
    throw new PersistenceError(`Invalid SQLite URL '${url}': no database path`);
  }
  return path;
}

/**
 * better-sqlite3 binds only strings, numbers, bigints, buffers and null.
 */
export function toSqliteParameter(value: SqlValue): SqliteParameter {
  if (value === null) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  return JSON.stringify(value, (_key, entry: unknown) =>
    typeof entry === "bigint" ? entry.toString() : entry,
  );
}

function toPositionalRow(row: unknown): unknown[] {
  if (!Array.isArray(row)) {
    throw new PersistenceError("SQLite returned a row that is not in raw mode");
  }
  return row.map(fromSqliteInteger);
}

export function fromSqliteInteger(value: unknown): unknown {
  if (
    typeof value === "bigint" &&
    value <= BigInt(Number.MAX_SAFE_INTEGER) &&
    value >= BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    return Number(value);
  }
  return value;
}
