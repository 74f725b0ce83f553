/**
 * @module main
 * Package entry point
 */

export * from "../core/index.js";
export * from "../adapters/index.js";
export * from "../scripts/run-migrations.js";
