/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./connection-provider.port.js";
export * from "./database-driver.port.js";
export * from "./logger.port.js";
export * from "./sql-executor.port.js";
