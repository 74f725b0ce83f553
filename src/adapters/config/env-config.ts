/**
 * Environment Configuration
 *
 * Reads connection settings and the migration directory from environment
 * variables:
 *
 * - DATABASE_DRIVER   driver identifier (default "pg")
 * - DATABASE_URL      connection URL (required)
 * - DATABASE_USERNAME (default "")
 * - DATABASE_PASSWORD (default "")
 * - MIGRATIONS_DIR    migration scripts directory (default "./migrations")
 * - LOG_LEVEL         debug | info | warn | error (default "info")
 */

import { z } from "zod";
import { PersistenceError } from "../../core/domain/errors/index.js";
import type { ConnectionProvider } from "../../core/ports/connection-provider.port.js";
import type { LogLevel } from "../logging/console-logger.js";

const EnvSchema = z.object({
  DATABASE_DRIVER: z.string().min(1).default("pg"),
  DATABASE_URL: z.string().min(1),
  DATABASE_USERNAME: z.string().default(""),
  DATABASE_PASSWORD: z.string().default(""),
  MIGRATIONS_DIR: z.string().min(1).default("./migrations"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface AppConfig {
  connection: ConnectionProvider;
  migrationsDir: string;
  logLevel: LogLevel;
}

export function loadConnectionConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new PersistenceError(`Invalid database configuration: ${keys.join(", ")}`, {
      cause: parsed.error,
    });
  }

  const config = parsed.data;
  return {
    connection: Object.freeze({
      driver: config.DATABASE_DRIVER,
      url: config.DATABASE_URL,
      username: config.DATABASE_USERNAME,
      password: config.DATABASE_PASSWORD,
    }),
    migrationsDir: config.MIGRATIONS_DIR,
    logLevel: config.LOG_LEVEL,
  };
}
