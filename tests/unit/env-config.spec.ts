import { describe, it, expect } from 'vitest';
import { loadConnectionConfig } from '../../src/adapters/config/env-config.js';
import { PersistenceError } from '../../src/core/domain/errors/index.js';

describe('loadConnectionConfig', () => {
  it('should apply defaults', () => {
    const config = loadConnectionConfig({ DATABASE_URL: 'postgresql://localhost:5432/app' });

    expect(config).toEqual({
      connection: {
        driver: 'pg',
        url: 'postgresql://localhost:5432/app',
        username: '',
        password: '',
      },
      migrationsDir: './migrations',
      logLevel: 'info',
    });
    expect(Object.isFrozen(config.connection)).toBe(true);
  });

  it('should read every setting', () => {
    const config = loadConnectionConfig({
      DATABASE_DRIVER: 'sqlite',
      DATABASE_URL: 'sqlite:./data/app.db',
      DATABASE_USERNAME: 'test-user',
      DATABASE_PASSWORD: 'test-secret',
      MIGRATIONS_DIR: './db/migrations',
      LOG_LEVEL: 'debug',
    });

    expect(config.connection).toEqual({
      driver: 'sqlite',
      url: 'sqlite:./data/app.db',
      username: 'test-user',
      password: 'test-secret',
    });
    expect(config.migrationsDir).toBe('./db/migrations');
    expect(config.logLevel).toBe('debug');
  });

  it('should name every invalid setting', () => {
    const error = (() => {
      try {
        loadConnectionConfig({ LOG_LEVEL: 'loud' });
      } catch (err) {
        return err;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({
      message: 'Invalid database configuration: DATABASE_URL, LOG_LEVEL',
    });
  });
});
