/**
 * Statement Spec Value Object
 *
 * SQL text plus positional bind values, frozen once built. One spec is built
 * per logical operation and handed to the QueryExecutor.
 */

import { PersistenceError } from "../errors/index.js";
import {
  hasArguments,
  requireAtLeastOne,
  requireNonNull,
  requireText,
} from "../validation.js";
import { isOutcomeKind, type OutcomeKind } from "./outcome-kind.js";
import type { SqlValue } from "./sql-value.js";

export class StatementSpec {
  readonly text: string;
  readonly args: readonly SqlValue[];
  /** Overrides keyword-based classification when the driver reports no result set. */
  readonly outcome?: OutcomeKind;

  private constructor(text: string, args: readonly SqlValue[], outcome?: OutcomeKind) {
    this.text = text;
    this.args = args;
    this.outcome = outcome;
    Object.freeze(this);
  }

  /**
   * @param args - positional values bound from index 1; when given, at least one
   */
  static of(
    text: string,
    args?: readonly SqlValue[],
    outcome?: OutcomeKind,
  ): StatementSpec {
    const sql = requireText(text, "string query");
    const values =
      args === undefined ? [] : [...requireAtLeastOne(args, "SqlValue... args")];
    if (outcome !== undefined && !isOutcomeKind(outcome)) {
      throw new PersistenceError(`Unknown statement outcome '${String(outcome)}'`);
    }
    return new StatementSpec(sql, Object.freeze(values), outcome);
  }

  hasArguments(): boolean {
    return hasArguments(this.args);
  }
}

/**
 * Fluent builder handed to statement-building callbacks:
 *
 * @example
 * ```typescript
 * unit.persist((q) => q.setQuery("SELECT * FROM users WHERE id = $1").setArgs(42));
 * ```
 */
export class StatementBuilder {
  private text?: string;
  private args?: readonly SqlValue[];
  private outcome?: OutcomeKind;

  setQuery(text: string): this {
    if (this.text !== undefined) {
      throw new PersistenceError("The query text has already been set");
    }
    this.text = requireText(text, "string query");
    return this;
  }

  setArgs(...args: SqlValue[]): this {
    this.args = requireAtLeastOne(args, "SqlValue... args");
    return this;
  }

  setOutcome(outcome: OutcomeKind): this {
    this.outcome = requireNonNull(outcome, "OutcomeKind outcome");
    return this;
  }

  build(): StatementSpec {
    return StatementSpec.of(
      requireNonNull(this.text, "string query"),
      this.args,
      this.outcome,
    );
  }
}
