/**
 * MappedResult Entity
 *
 * Single-pass, forward-only cursor over exactly one result shape:
 * named-column rows, generated keys, or an affected-row count.
 *
 * Row and key reads require next() to have moved the cursor onto a valid
 * position first. A result is populated once by the executor, handed to one
 * mapper, then released; any read after release fails.
 */

import { PersistenceError } from "../errors/index.js";
import type { SqlValue } from "../value-objects/sql-value.js";

export type ResultShape = "rows" | "generatedKeys" | "rowsAffected";

/**
 * Column name to value, in the column order the driver declared. When a
 * statement returns two columns with the same name, the later one wins;
 * alias them to read both.
 */
export type ResultRow = ReadonlyMap<string, SqlValue>;

const BEFORE_FIRST = -1;
const UNSET = -1;

export class MappedResult {
  private cursor = BEFORE_FIRST;
  private released = false;

  private constructor(
    private readonly rows: readonly ResultRow[] | null,
    private readonly keys: readonly SqlValue[] | null,
    private readonly affected: number,
    private readonly columnNames: readonly string[],
  ) {}

  static fromRows(columns: readonly string[], rows: readonly ResultRow[]): MappedResult {
    return new MappedResult(rows, null, UNSET, columns);
  }

  static fromGeneratedKeys(keys: readonly SqlValue[]): MappedResult {
    return new MappedResult(null, keys, UNSET, []);
  }

  static fromRowsAffected(count: number): MappedResult {
    if (!Number.isInteger(count) || count < 0) {
      throw new PersistenceError(`Invalid affected row count: ${count}`);
    }
    return new MappedResult(null, null, count, []);
  }

  get shape(): ResultShape {
    if (this.rows) return "rows";
    if (this.keys) return "generatedKeys";
    return "rowsAffected";
  }

  /** Number of rows or generated keys; 0 for an affected-row count. */
  get size(): number {
    return this.rows?.length ?? this.keys?.length ?? 0;
  }

  get columns(): readonly string[] {
    return this.columnNames;
  }

  /**
   * Advance to the next row or key. Returns false once the cursor has moved
   * past the last entry; it stays there on further calls.
   */
  next(): boolean {
    this.assertLive();
    if (!this.rows && !this.keys) {
      throw new PersistenceError(
        "There are no query results to iterate (the statement reported an affected-row count)",
      );
    }
    this.cursor = Math.min(this.cursor + 1, this.size);
    return this.cursor < this.size;
  }

  /** Value of the named column in the current row; last one wins on duplicate names. */
  column(name: string): SqlValue {
    const row = this.row();
    if (!row.has(name)) {
      throw new PersistenceError(
        `Unknown column '${name}' (available: ${this.columnNames.join(", ")})`,
      );
    }
    return row.get(name) ?? null;
  }

  /** The row under the cursor. */
  row(): ResultRow {
    this.assertLive();
    if (!this.rows) {
      throw new PersistenceError("There are no results with named columns");
    }
    return this.rows[this.positioned(this.rows.length)];
  }

  generatedKey(): SqlValue {
    this.assertLive();
    if (!this.keys) {
      throw new PersistenceError("There are no generated keys for this statement");
    }
    return this.keys[this.positioned(this.keys.length)];
  }

  rowsAffected(): number {
    this.assertLive();
    if (this.affected === UNSET) {
      throw new PersistenceError("The statement did not report an affected-row count");
    }
    return this.affected;
  }

  /**
   * Invalidate this result. Called by the executor once the mapper returns.
   * @internal
   */
  release(): void {
    this.released = true;
  }

  private positioned(length: number): number {
    if (this.cursor < 0 || this.cursor >= length) {
      throw new PersistenceError(
        "Call next() and check it returned true before reading from MappedResult",
      );
    }
    return this.cursor;
  }

  private assertLive(): void {
    if (this.released) {
      throw new PersistenceError(
        "MappedResult has been released; read it inside the mapper only",
      );
    }
  }
}
