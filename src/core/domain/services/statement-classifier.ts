/**
 * Statement Classifier
 *
 * Decides which result shape a statement produces when the driver reports no
 * result set. Classification reads keywords, never raw substrings: string
 * literals, quoted identifiers and comments are skipped, so a SELECT mentioning
 * 'UPDATE' in a literal stays a SELECT.
 */

import type { OutcomeKind } from "../value-objects/outcome-kind.js";

interface Keyword {
  word: string;
  depth: number;
}

const KEYWORD_OUTCOMES: Readonly<Record<string, OutcomeKind>> = {
  INSERT: "generatedKeys",
  REPLACE: "generatedKeys",
  UPDATE: "rowsAffected",
  DELETE: "rowsAffected",
  MERGE: "rowsAffected",
  SELECT: "rows",
};

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_$]/;
const WHITESPACE = /\s/;

/**
 * Yields the bare words of a statement, upper-cased, with their parenthesis depth.
 */
function* keywords(sql: string): Generator<Keyword> {
  let depth = 0;
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "-" && next === "-") {
      const end = sql.indexOf("\n", i + 2);
      i = end === -1 ? sql.length : end + 1;
    } else if (ch === "/" && next === "*") {
      const end = sql.indexOf("*/", i + 2);
      i = end === -1 ? sql.length : end + 2;
    } else if (ch === "'" || ch === '"' || ch === "`") {
      i = skipQuoted(sql, i, ch);
    } else if (ch === "(") {
      depth++;
      i++;
    } else if (ch === ")") {
      depth = Math.max(0, depth - 1);
      i++;
    } else if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      yield { word: sql.slice(i, end).toUpperCase(), depth };
      i = end;
    } else {
      i++;
    }
  }
}

/** A doubled quote inside a quoted run is an escaped quote. */
function skipQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

/**
 * First keyword of the statement, or undefined when it holds only whitespace
 * and comments.
 */
export function leadingKeyword(sql: string): string | undefined {
  for (const { word } of keywords(sql)) return word;
  return undefined;
}

/** Whether `word` appears as a bare keyword, outside literals and comments. */
export function containsKeyword(sql: string, word: string): boolean {
  const target = word.toUpperCase();
  for (const keyword of keywords(sql)) {
    if (keyword.word === target) return true;
  }
  return false;
}

/**
 * The statement without trailing whitespace, comments or `;` terminators,
 * so a clause can be appended to it.
 */
export function trimStatement(sql: string): string {
  let end = 0;
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "-" && next === "-") {
      const lineEnd = sql.indexOf("\n", i + 2);
      i = lineEnd === -1 ? sql.length : lineEnd + 1;
    } else if (ch === "/" && next === "*") {
      const blockEnd = sql.indexOf("*/", i + 2);
      i = blockEnd === -1 ? sql.length : blockEnd + 2;
    } else if (ch === "'" || ch === '"' || ch === "`") {
      i = skipQuoted(sql, i, ch);
      end = i;
    } else {
      if (ch !== ";" && !WHITESPACE.test(ch)) end = i + 1;
      i++;
    }
  }
  return sql.slice(0, end);
}

/**
 * Statement keyword that decides the outcome. For a common table expression
 * (`WITH ... AS (...) INSERT ...`) that is the first top-level data keyword
 * after the CTE definitions.
 */
export function statementKeyword(sql: string): string | undefined {
  const iterator = keywords(sql);
  const first = iterator.next();
  if (first.done) return undefined;
  if (first.value.word !== "WITH") return first.value.word;

  for (const { word, depth } of iterator) {
    if (depth === 0 && word in KEYWORD_OUTCOMES) return word;
  }
  return undefined;
}

/**
 * Outcome of a statement whose execution reported no result set.
 * Statements without a data keyword (DDL, transaction control) report an
 * affected-row count.
 */
export function classifyStatement(sql: string): OutcomeKind {
  const keyword = statementKeyword(sql);
  const outcome = keyword === undefined ? undefined : KEYWORD_OUTCOMES[keyword];
  if (outcome === undefined || outcome === "rows") return "rowsAffected";
  return outcome;
}
