/**
 * @module core/domain
 * Entities, value objects, services and errors
 */

export * from "./entities/index.js";
export * from "./value-objects/index.js";
export * from "./services/index.js";
export * from "./errors/index.js";
export * from "./validation.js";
