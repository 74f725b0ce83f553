/**
 * @module adapters
 * Adapters for external systems (database drivers, logging, configuration)
 */

export * from "./persistence/index.js";
export * from "./logging/index.js";
export * from "./config/index.js";
