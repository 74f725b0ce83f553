export * from "./outcome-kind.js";
export * from "./sql-value.js";
export * from "./statement-spec.js";
