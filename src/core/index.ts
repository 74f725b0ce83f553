/**
 * @module core
 * Statement execution, result cursor and migrations, independent of any driver
 */

export * from "./domain/index.js";
export * from "./ports/index.js";
export * from "./use-cases/index.js";
