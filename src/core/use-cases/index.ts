/**
 * @module core/use-cases
 * Application use cases (orchestration layer)
 */

export * from "./apply-migrations.use-case.js";
