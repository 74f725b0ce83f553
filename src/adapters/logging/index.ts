/**
 * @module adapters/logging
 * Logger adapters
 */

export * from "./console-logger.js";
