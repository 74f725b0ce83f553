/**
 * Domain Services Index
 */

export * from "./statement-classifier.js";
export * from "./query-executor.js";
export * from "./persistence-unit.js";
