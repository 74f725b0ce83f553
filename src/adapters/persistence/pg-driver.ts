/**
 * PostgreSQL Driver (Default)
 *
 * One pg.Client per connection; transactions are demarcated with
 * BEGIN/COMMIT/ROLLBACK. Rows are read in array mode so values keep the
 * column order of the field list.
 *
 * In generated-keys mode an INSERT without a RETURNING clause is sent with
 * `RETURNING *` appended on its own line, after any trailing comment is
 * dropped; its rows become the generated keys rather than a result set.
 *
 * Values pg parses into class instances (interval, for one) are turned into
 * their text form before they leave the driver.
 */

import pg from "pg";
import type {
  ConnectionOptions,
  DatabaseDriver,
  DriverConnection,
  DriverOutcome,
  DriverResultSet,
  DriverStatement,
  PrepareOptions,
} from "../../core/ports/database-driver.port.js";
import { emptyResultSet } from "../../core/ports/database-driver.port.js";
import {
  containsKeyword,
  leadingKeyword,
  trimStatement,
} from "../../core/domain/services/statement-classifier.js";
import type { SqlValue } from "../../core/domain/value-objects/sql-value.js";
import { bindIndex } from "./bind-index.js";

export class PgDriver implements DatabaseDriver {
  readonly name = "pg";

  async connect(options: ConnectionOptions): Promise<DriverConnection> {
    const client = new pg.Client({
      connectionString: options.url,
      user: options.username || undefined,
      password: options.password || undefined,
    });
    await client.connect();
    return new PgConnection(client);
  }
}

export class PgConnection implements DriverConnection {
  constructor(private readonly client: pg.Client) {}

  async begin(): Promise<void> {
    await this.client.query("BEGIN");
  }

  async prepare(sql: string, options: PrepareOptions): Promise<DriverStatement> {
    return new PgStatement(this.client, sql, options);
  }

  async commit(): Promise<void> {
    await this.client.query("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.client.query("ROLLBACK");
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

class PgStatement implements DriverStatement {
  private readonly values: SqlValue[] = [];

  constructor(
    private readonly client: pg.Client,
    private readonly sql: string,
    private readonly options: PrepareOptions,
  ) {}

  bind(index: number, value: SqlValue): void {
    this.values[bindIndex(index)] = value;
  }

  async execute(): Promise<DriverOutcome> {
    const appendReturning =
      this.options.returnGeneratedKeys && needsReturningClause(this.sql);
    const text = appendReturning
      ? `${trimStatement(this.sql)}\nRETURNING *`
      : this.sql;

    const result = await this.client.query<unknown[]>({
      text,
      values: this.values,
      rowMode: "array",
    });

    const set: DriverResultSet = {
      columns: result.fields.map((field) => field.name),
      rows: result.rows.map((row) => row.map(toPgColumnValue)),
    };
    const updateCount = result.rowCount ?? 0;

    if (appendReturning) {
      return { resultSet: null, updateCount, generatedKeys: set };
    }
    return {
      resultSet: result.fields.length > 0 ? set : null,
      updateCount,
      generatedKeys: emptyResultSet(),
    };
  }

  async close(): Promise<void> {
    this.values.length = 0;
  }
}

export function needsReturningClause(sql: string): boolean {
  return leadingKeyword(sql) === "INSERT" && !containsKeyword(sql, "RETURNING");
}

/**
 * Plain form of a parsed pg column value. Objects that serialize themselves
 * through `toPostgres()` become that text; other class instances keep their
 * own enumerable fields.
 */
export function toPgColumnValue(value: unknown): unknown {
  if (value === null || typeof value !== "object") return value;
  if (value instanceof Date || value instanceof Uint8Array) return value;
  if (Array.isArray(value)) return value.map(toPgColumnValue);
  if ("toPostgres" in value && typeof value.toPostgres === "function") {
    const text: unknown = value.toPostgres();
    return toPgColumnValue(text);
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, toPgColumnValue(entry)]),
  );
}
