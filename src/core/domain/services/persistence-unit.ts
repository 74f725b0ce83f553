/**
 * Persistence Unit
 *
 * Fluent entry point: build a statement with a callback, then execute it with
 * a mapper.
 *
 * @example
 * ```typescript
 * const unit = new PersistenceUnit(executor);
 *
 * const names = await unit
 *   .persist((q) => q.setQuery("SELECT name FROM users WHERE active = $1").setArgs(true))
 *   .execute((result) => {
 *     const out: string[] = [];
 *     while (result.next()) out.push(asString(result.column("name")));
 *     return out;
 *   });
 * ```
 */

import type { RowMapper, StatementExecutor } from "../../ports/sql-executor.port.js";
import { requireNonNull } from "../validation.js";
import { StatementBuilder, type StatementSpec } from "../value-objects/statement-spec.js";

export type StatementBuild = (builder: StatementBuilder) => StatementBuilder;

export class PersistenceUnit {
  private readonly executor: StatementExecutor;

  constructor(executor: StatementExecutor) {
    this.executor = requireNonNull(executor, "StatementExecutor executor");
  }

  persist(build: StatementBuild): QueryCollector {
    const builder = requireNonNull(build, "StatementBuild build")(new StatementBuilder());
    return new QueryCollector(
      this.executor,
      requireNonNull(builder, "StatementBuilder builder").build(),
    );
  }
}

export class QueryCollector {
  constructor(
    private readonly executor: StatementExecutor,
    readonly statement: StatementSpec,
  ) {}

  async execute<T>(mapper: RowMapper<T>): Promise<T> {
    return this.executor.execute(this.statement, requireNonNull(mapper, "RowMapper<T> mapper"));
  }
}
