/**
 * Query Executor
 *
 * Runs one statement per connection and per transaction:
 *
 *   connect → begin → prepare → bind → execute → classify → commit → map → close
 *
 * Commit happens before the mapper runs, so a mapper failure never undoes
 * persisted work; it propagates to the caller unchanged. Statement and
 * connection are closed on every exit path.
 */

import type {
  ConnectionOptions,
  DatabaseDriver,
  DriverConnection,
  DriverOutcome,
  DriverResolver,
  DriverResultSet,
} from "../../ports/database-driver.port.js";
import type { ConnectionProvider } from "../../ports/connection-provider.port.js";
import { silentLogger, type Logger } from "../../ports/logger.port.js";
import type {
  RowMapper,
  StatementExecutor,
  TransactionRunner,
  TransactionScope,
} from "../../ports/sql-executor.port.js";
import { MappedResult, type ResultRow } from "../entities/mapped-result.js";
import { describeError, PersistenceError } from "../errors/index.js";
import { requireNonNull } from "../validation.js";
import { toSqlValue, type SqlValue } from "../value-objects/sql-value.js";
import { StatementSpec } from "../value-objects/statement-spec.js";
import { classifyStatement } from "./statement-classifier.js";

export interface QueryExecutorConfig {
  provider: ConnectionProvider;
  drivers: DriverResolver;
  logger?: Logger;
}

const EXECUTION_FAILED = "The execution of the query statement has failed";
const TRANSACTION_FAILED = "The transaction has failed";

export class QueryExecutor implements StatementExecutor, TransactionRunner {
  private readonly provider: ConnectionProvider;
  private readonly drivers: DriverResolver;
  private readonly logger: Logger;

  constructor(config: QueryExecutorConfig) {
    const { provider, drivers, logger } = requireNonNull(
      config,
      "QueryExecutorConfig config",
    );
    this.provider = requireNonNull(provider, "ConnectionProvider provider");
    this.drivers = requireNonNull(drivers, "DriverResolver drivers");
    this.logger = logger ?? silentLogger;
  }

  /**
   * Execute a statement in its own transaction and map the result.
   *
   * @example
   * ```typescript
   * const ids = await executor.execute(
   *   StatementSpec.of("INSERT INTO users (name) VALUES ($1)", ["ada"]),
   *   (result) => {
   *     const keys: SqlValue[] = [];
   *     while (result.next()) keys.push(result.generatedKey());
   *     return keys;
   *   },
   * );
   * ```
   */
  async execute<T>(spec: StatementSpec, mapper: RowMapper<T>): Promise<T> {
    const statement = requireNonNull(spec, "StatementSpec spec");
    const map = requireNonNull(mapper, "RowMapper<T> mapper");

    return this.withConnection<T>(async (connection): Promise<T> => {
      await this.begin(connection);
      const result = await this.inTransaction(connection, EXECUTION_FAILED, () =>
        this.runStatement(connection, statement),
      );
      try {
        return await map(result);
      } finally {
        result.release();
      }
    });
  }

  /**
   * Run `work` inside one transaction on one connection. Commits when `work`
   * resolves, rolls back when it throws.
   */
  async transaction<T>(work: (tx: TransactionScope) => Promise<T>): Promise<T> {
    const fn = requireNonNull(work, "TransactionScope work");

    return this.withConnection<T>(async (connection): Promise<T> => {
      await this.begin(connection);
      return this.inTransaction(connection, TRANSACTION_FAILED, () =>
        fn(this.scope(connection)),
      );
    });
  }

  private scope(connection: DriverConnection): TransactionScope {
    const specFor = (sql: string, args: SqlValue[]): StatementSpec =>
      StatementSpec.of(sql, args.length > 0 ? args : undefined);

    return {
      run: (sql, ...args) => this.runStatement(connection, specFor(sql, args)),
      query: async (sql, ...args) => {
        const result = await this.runStatement(connection, specFor(sql, args));
        if (result.shape !== "rows") {
          throw new PersistenceError(`Statement did not produce a result set: ${sql}`);
        }
        const rows: ResultRow[] = [];
        while (result.next()) rows.push(result.row());
        return rows;
      },
    };
  }

  private resolveDriver(): { driver: DatabaseDriver; options: ConnectionOptions } {
    const identifier = requireNonNull(this.provider.driver, "string driver");
    const options: ConnectionOptions = {
      url: requireNonNull(this.provider.url, "string url"),
      username: requireNonNull(this.provider.username, "string username"),
      password: requireNonNull(this.provider.password, "string password"),
    };

    const driver = this.drivers.resolve(identifier);
    if (!driver) {
      throw new PersistenceError(`Unable to load database driver '${identifier}'`);
    }
    return { driver, options };
  }

  private async withConnection<T>(
    work: (connection: DriverConnection) => Promise<T>,
  ): Promise<T> {
    const { driver, options } = this.resolveDriver();

    let connection: DriverConnection;
    try {
      connection = await driver.connect(options);
    } catch (error) {
      throw new PersistenceError("Connection has failed", { cause: error });
    }
    this.logger.debug("The database connection has been accepted", {
      driver: driver.name,
    });

    let value: Awaited<T>;
    try {
      value = await work(connection);
    } catch (error) {
      await this.closeAfterFailure(connection, error);
      throw error;
    }

    try {
      await connection.close();
    } catch (error) {
      throw new PersistenceError("Unable to release the database connection", {
        cause: error,
      });
    }
    return value;
  }

  private async begin(connection: DriverConnection): Promise<void> {
    try {
      await connection.begin();
    } catch (error) {
      throw new PersistenceError("Connection has failed", { cause: error });
    }
  }

  private async inTransaction<T>(
    connection: DriverConnection,
    failure: string,
    work: () => Promise<T>,
  ): Promise<T> {
    let value: Awaited<T>;
    try {
      value = await work();
    } catch (error) {
      await this.rollback(connection, error);
      throw error instanceof PersistenceError
        ? error
        : new PersistenceError(failure, { cause: error });
    }

    try {
      await connection.commit();
    } catch (error) {
      await this.rollback(connection, error);
      throw new PersistenceError("Unable to commit the transaction", { cause: error });
    }
    return value;
  }

  private async runStatement(
    connection: DriverConnection,
    spec: StatementSpec,
  ): Promise<MappedResult> {
    if (spec.hasArguments()) {
      this.logger.debug("The query statement has been built", {
        query: spec.text,
        args: spec.args.length,
      });
    }

    const statement = await connection.prepare(spec.text, { returnGeneratedKeys: true });
    try {
      spec.args.forEach((value, index) => statement.bind(index + 1, value));
      const outcome = await statement.execute();
      return toMappedResult(spec, outcome);
    } finally {
      await statement.close();
    }
  }

  private async rollback(connection: DriverConnection, cause: unknown): Promise<void> {
    try {
      await connection.rollback();
    } catch (error) {
      this.logger.error("Unable to roll back the transaction", {
        error: describeError(error),
        cause: describeError(cause),
      });
    }
  }

  private async closeAfterFailure(
    connection: DriverConnection,
    cause: unknown,
  ): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.logger.error("Unable to release the database connection", {
        error: describeError(error),
        cause: describeError(cause),
      });
    }
  }
}

/**
 * Classify a driver outcome into one result shape. A reported result set is
 * rows unless the statement explicitly asks for another shape; without one, the
 * explicit outcome or the statement's keyword decides.
 */
export function toMappedResult(spec: StatementSpec, outcome: DriverOutcome): MappedResult {
  const { resultSet } = outcome;

  if (resultSet) {
    switch (spec.outcome) {
      case "generatedKeys":
        return MappedResult.fromGeneratedKeys(firstColumn(resultSet));
      case "rowsAffected":
        return MappedResult.fromRowsAffected(resultSet.rows.length);
      default:
        return MappedResult.fromRows(resultSet.columns, toRows(resultSet));
    }
  }

  switch (spec.outcome ?? classifyStatement(spec.text)) {
    case "generatedKeys":
      return MappedResult.fromGeneratedKeys(firstColumn(outcome.generatedKeys));
    case "rows":
      return MappedResult.fromRows([], []);
    case "rowsAffected":
      return MappedResult.fromRowsAffected(outcome.updateCount);
  }
}

function toRows(set: DriverResultSet): ResultRow[] {
  return set.rows.map((values) => {
    const row = new Map<string, SqlValue>();
    set.columns.forEach((column, index) => row.set(column, toSqlValue(values[index])));
    return row;
  });
}

function firstColumn(set: DriverResultSet): SqlValue[] {
  return set.rows.map((values) => toSqlValue(values[0]));
}
