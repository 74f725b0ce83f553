/**
 * @module adapters/config
 * Environment configuration
 */

export * from "./env-config.js";
