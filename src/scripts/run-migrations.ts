/**
 * Migration Logic
 *
 * Wires configuration, drivers, executor and runner, then applies the
 * configured migration directory. Used by scripts/migrate.ts.
 */

import { loadConnectionConfig } from "../adapters/config/env-config.js";
import { ConsoleLogger } from "../adapters/logging/console-logger.js";
import { DriverRegistry } from "../adapters/persistence/driver-registry.js";
import { QueryExecutor } from "../core/domain/services/query-executor.js";
import type { DriverResolver } from "../core/ports/database-driver.port.js";
import type { Logger } from "../core/ports/logger.port.js";
import {
  MigrationRunner,
  type MigrationReport,
} from "../core/use-cases/apply-migrations.use-case.js";

export interface RunMigrationsOptions {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  drivers?: DriverResolver;
  /** Overrides MIGRATIONS_DIR. */
  directory?: string;
}

export async function runMigrationsFromEnv(
  options: RunMigrationsOptions = {},
): Promise<MigrationReport> {
  const config = loadConnectionConfig(options.env ?? process.env);
  const logger = options.logger ?? new ConsoleLogger("Migrations", config.logLevel);

  const executor = new QueryExecutor({
    provider: config.connection,
    drivers: options.drivers ?? DriverRegistry.withDefaults(),
    logger,
  });

  const directory = options.directory ?? config.migrationsDir;
  logger.info("Applying migrations", { directory, driver: config.connection.driver });
  return new MigrationRunner(executor, logger).applyMigrations(directory);
}
