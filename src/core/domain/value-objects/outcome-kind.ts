/**
 * Outcome Kind Value Object
 *
 * Which of the three result shapes a statement execution populates.
 */

export type OutcomeKind = "rows" | "generatedKeys" | "rowsAffected";

export const OutcomeKindValues = {
  ROWS: "rows" as const,
  GENERATED_KEYS: "generatedKeys" as const,
  ROWS_AFFECTED: "rowsAffected" as const,
};

const OUTCOME_KINDS: readonly string[] = Object.values(OutcomeKindValues);

export function isOutcomeKind(value: string): value is OutcomeKind {
  return OUTCOME_KINDS.includes(value);
}
