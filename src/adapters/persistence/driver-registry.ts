/**
 * Driver Registry
 *
 * Resolves the driver identifier from a ConnectionProvider to a driver
 * instance. Identifiers are case-insensitive.
 */

import type { DatabaseDriver, DriverResolver } from "../../core/ports/database-driver.port.js";
import { PersistenceError } from "../../core/domain/errors/index.js";
import { PgDriver } from "./pg-driver.js";
import { SqliteDriver } from "./sqlite-driver.js";

export class DriverRegistry implements DriverResolver {
  private readonly drivers = new Map<string, DatabaseDriver>();

  /**
   * Registry with the bundled drivers:
   * `pg` / `postgres` / `postgresql` and `sqlite` / `sqlite3` / `better-sqlite3`.
   */
  static withDefaults(): DriverRegistry {
    return new DriverRegistry()
      .register(new PgDriver(), ["postgres", "postgresql"])
      .register(new SqliteDriver(), ["sqlite3", "better-sqlite3"]);
  }

  register(driver: DatabaseDriver, aliases: string[] = []): this {
    for (const identifier of [driver.name, ...aliases]) {
      const key = identifier.trim().toLowerCase();
      if (key.length === 0) {
        throw new PersistenceError("Driver identifiers must not be empty");
      }
      this.drivers.set(key, driver);
    }
    return this;
  }

  resolve(identifier: string): DatabaseDriver | undefined {
    return this.drivers.get(identifier.trim().toLowerCase());
  }

  identifiers(): string[] {
    return [...this.drivers.keys()].sort();
  }
}
