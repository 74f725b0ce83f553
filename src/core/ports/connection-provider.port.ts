/**
 * Connection Provider Port
 *
 * Supplies the driver identifier and credentials for every new connection.
 * Read on each execution, so an implementation may back these with getters.
 */

export interface ConnectionProvider {
  /** Driver identifier resolved through the DriverResolver (e.g. "pg", "sqlite"). */
  readonly driver: string;
  readonly url: string;
  readonly username: string;
  readonly password: string;
}
