import { describe, it, expect } from 'vitest';
import { DriverRegistry } from '../../src/adapters/persistence/driver-registry.js';
import { PgDriver } from '../../src/adapters/persistence/pg-driver.js';
import { SqliteDriver } from '../../src/adapters/persistence/sqlite-driver.js';
import { FakeDriver } from '../support/fake-driver.js';

describe('DriverRegistry', () => {
  it('should register the bundled drivers with their aliases', () => {
    const registry = DriverRegistry.withDefaults();

    expect(registry.identifiers()).toEqual([
      'better-sqlite3',
      'pg',
      'postgres',
      'postgresql',
      'sqlite',
      'sqlite3',
    ]);
    expect(registry.resolve('postgresql')).toBeInstanceOf(PgDriver);
    expect(registry.resolve('better-sqlite3')).toBeInstanceOf(SqliteDriver);
  });

  it('should resolve identifiers case-insensitively', () => {
    const registry = DriverRegistry.withDefaults();
    expect(registry.resolve('  PG ')).toBeInstanceOf(PgDriver);
  });

  it('should return undefined for an unknown identifier', () => {
    expect(DriverRegistry.withDefaults().resolve('oracle')).toBeUndefined();
  });

  it('should accept custom drivers', () => {
    const driver = new FakeDriver();
    const registry = new DriverRegistry().register(driver, ['Mock']);
    expect(registry.resolve('fake')).toBe(driver);
    expect(registry.resolve('mock')).toBe(driver);
  });

  it('should reject blank identifiers', () => {
    expect(() => new DriverRegistry().register(new FakeDriver(), [' '])).toThrow(
      'Driver identifiers must not be empty',
    );
  });
});
