/**
 * @module adapters/persistence
 * Database driver adapters
 */

export * from "./driver-registry.js";
export * from "./pg-driver.js";
export * from "./sqlite-driver.js";
