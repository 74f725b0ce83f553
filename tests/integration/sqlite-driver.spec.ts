/**
 * SQLite Driver Integration Tests
 *
 * Runs the QueryExecutor against a real better-sqlite3 database in a
 * temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DriverRegistry } from '../../src/adapters/persistence/driver-registry.js';
import {
  fromSqliteInteger,
  parseSqliteUrl,
  toSqliteParameter,
} from '../../src/adapters/persistence/sqlite-driver.js';
import type { MappedResult } from '../../src/core/domain/entities/mapped-result.js';
import { QueryExecutor } from '../../src/core/domain/services/query-executor.js';
import type { SqlValue } from '../../src/core/domain/value-objects/sql-value.js';
import { StatementSpec } from '../../src/core/domain/value-objects/statement-spec.js';

const keys = (result: MappedResult): SqlValue[] => {
  const out: SqlValue[] = [];
  while (result.next()) out.push(result.generatedKey());
  return out;
};

const rows = (result: MappedResult): SqlValue[][] => {
  const out: SqlValue[][] = [];
  while (result.next()) out.push([...result.row().values()]);
  return out;
};

describe('SqliteDriver (Integration)', () => {
  let dir: string;
  let executor: QueryExecutor;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sqlite-driver-'));
    executor = new QueryExecutor({
      provider: {
        driver: 'sqlite',
        url: `sqlite:${join(dir, 'app.db')}`,
        username: '',
        password: '',
      },
      drivers: DriverRegistry.withDefaults(),
    });

    await executor.execute(
      StatementSpec.of(
        'CREATE TABLE users (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT NOT NULL, active INTEGER NOT NULL DEFAULT 1, avatar BLOB)',
      ),
      (result) => result.rowsAffected(),
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return the rowid of each inserted row as its generated key', async () => {
    const first = await executor.execute(
      StatementSpec.of('INSERT INTO users (name) VALUES (?)', ['ada']),
      keys,
    );
    const second = await executor.execute(
      StatementSpec.of('INSERT INTO users (name) VALUES (?)', ['grace']),
      keys,
    );

    expect(first).toEqual([1]);
    expect(second).toEqual([2]);
  });

  it('should read rows back with named columns', async () => {
    await executor.execute(
      StatementSpec.of('INSERT INTO users (name, active) VALUES (?, ?), (?, ?)', [
        'ada',
        true,
        'grace',
        false,
      ]),
      keys,
    );

    const found = await executor.execute(
      StatementSpec.of('SELECT id, name, active FROM users ORDER BY id'),
      (result) => {
        expect(result.columns).toEqual(['id', 'name', 'active']);
        return rows(result);
      },
    );

    expect(found).toEqual([
      [1, 'ada', 1],
      [2, 'grace', 0],
    ]);
  });

  it('should report affected rows for UPDATE and DELETE', async () => {
    await executor.execute(
      StatementSpec.of("INSERT INTO users (name) VALUES ('ada'), ('grace'), ('alan')"),
      keys,
    );

    const updated = await executor.execute(
      StatementSpec.of('UPDATE users SET active = ? WHERE name <> ?', [false, 'ada']),
      (result) => result.rowsAffected(),
    );
    const deleted = await executor.execute(
      StatementSpec.of('DELETE FROM users WHERE active = ?', [false]),
      (result) => result.rowsAffected(),
    );

    expect(updated).toBe(2);
    expect(deleted).toBe(2);
  });

  it('should report no keys when an INSERT changes nothing', async () => {
    const inserted = await executor.execute(
      StatementSpec.of('INSERT INTO users (name) SELECT name FROM users WHERE id = ?', [99]),
      keys,
    );
    expect(inserted).toEqual([]);
  });

  it('should treat INSERT ... RETURNING as a result set', async () => {
    const returned = await executor.execute(
      StatementSpec.of('INSERT INTO users (name) VALUES (?) RETURNING id, name', ['ada']),
      rows,
    );
    expect(returned).toEqual([[1, 'ada']]);
  });

  it('should read integers beyond 2^53 as bigints', async () => {
    const found = await executor.execute(
      StatementSpec.of('SELECT 9007199254740993 AS n, CAST(9007199254740993 AS TEXT) AS s, 42 AS small'),
      rows,
    );
    expect(found).toEqual([[9007199254740993n, '9007199254740993', 42]]);
  });

  it('should return a large rowid as a bigint key', async () => {
    const inserted = await executor.execute(
      StatementSpec.of('INSERT INTO users (id, name) VALUES (?, ?)', [9007199254740993n, 'big']),
      keys,
    );
    const found = await executor.execute(
      StatementSpec.of('SELECT id FROM users WHERE name = ?', ['big']),
      rows,
    );

    expect(inserted).toEqual([9007199254740993n]);
    expect(found).toEqual([[9007199254740993n]]);
  });

  it('should round-trip bytes', async () => {
    await executor.execute(
      StatementSpec.of('INSERT INTO users (name, avatar) VALUES (?, ?)', [
        'ada',
        new Uint8Array([1, 2, 3]),
      ]),
      keys,
    );

    const avatar = await executor.execute(
      StatementSpec.of('SELECT avatar FROM users WHERE name = ?', ['ada']),
      (result) => (result.next() ? result.column('avatar') : null),
    );

    expect(avatar).toEqual(Buffer.from([1, 2, 3]));
  });

  it('should roll back every statement of a failed transaction', async () => {
    await expect(
      executor.transaction(async (tx) => {
        await tx.run('INSERT INTO users (name) VALUES (?)', 'ada');
        await tx.run('INSERT INTO users (name) VALUES (?)', null);
      }),
    ).rejects.toThrow('The transaction has failed');

    const count = await executor.transaction(async (tx) => {
      const [row] = await tx.query('SELECT COUNT(*) AS total FROM users');
      return row.get('total');
    });
    expect(count).toBe(0);
  });

  it('should roll back a failing statement', async () => {
    await expect(
      executor.execute(StatementSpec.of('INSERT INTO missing (id) VALUES (1)'), keys),
    ).rejects.toThrow('The execution of the query statement has failed');
  });
});

describe('parseSqliteUrl', () => {
  it('should strip known prefixes', () => {
    expect(parseSqliteUrl('sqlite:./data/app.db')).toBe('./data/app.db');
    expect(parseSqliteUrl('sqlite:///var/lib/app.db')).toBe('/var/lib/app.db');
    expect(parseSqliteUrl('file:app.db')).toBe('app.db');
    expect(parseSqliteUrl(':memory:')).toBe(':memory:');
  });

  it('should reject a URL without a path', () => {
    expect(() => parseSqliteUrl('sqlite:')).toThrow("Invalid SQLite URL 'sqlite:': no database path");
  });
});

describe('toSqliteParameter', () => {
  it('should convert values SQLite cannot bind directly', () => {
    expect(toSqliteParameter(true)).toBe(1);
    expect(toSqliteParameter(new Date('2024-05-06T07:08:09.000Z'))).toBe('2024-05-06T07:08:09.000Z');
    expect(toSqliteParameter({ id: 1n, tags: ['a'] })).toBe('{"id":"1","tags":["a"]}');
    expect(toSqliteParameter(null)).toBeNull();
  });
});

describe('fromSqliteInteger', () => {
  it('should narrow safe bigints to numbers', () => {
    expect(fromSqliteInteger(7n)).toBe(7);
    expect(fromSqliteInteger(-9007199254740991n)).toBe(-9007199254740991);
    expect(fromSqliteInteger(9007199254740992n)).toBe(9007199254740992n);
    expect(fromSqliteInteger(1.5)).toBe(1.5);
  });
});
