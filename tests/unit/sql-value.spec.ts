import { describe, it, expect } from 'vitest';
import {
  asBigInt,
  asBoolean,
  asDate,
  asNumber,
  asString,
  describeType,
  isSqlNull,
  toSqlValue,
} from '../../src/core/domain/value-objects/sql-value.js';

describe('toSqlValue', () => {
  it('should map undefined to null', () => {
    expect(toSqlValue(undefined)).toBeNull();
    expect(isSqlNull(toSqlValue(null))).toBe(true);
  });

  it('should pass scalars, dates and bytes through', () => {
    const date = new Date('2024-01-02T03:04:05.000Z');
    const bytes = new Uint8Array([1, 2]);
    expect(toSqlValue('a')).toBe('a');
    expect(toSqlValue(5n)).toBe(5n);
    expect(toSqlValue(date)).toBe(date);
    expect(toSqlValue(bytes)).toBe(bytes);
  });

  it('should normalize nested JSON values', () => {
    expect(toSqlValue({ tags: ['a', undefined], count: 1 })).toEqual({
      tags: ['a', null],
      count: 1,
    });
  });

  it('should reject functions and class instances', () => {
    expect(() => toSqlValue(() => 1)).toThrow('Unsupported column value of type function');
    expect(() => toSqlValue(new Map())).toThrow('Unsupported column value of type Map');
  });
});

describe('typed extraction', () => {
  it('should read strings', () => {
    expect(asString('ada')).toBe('ada');
    expect(() => asString(1, 'name')).toThrow('Expected name to be a string but received number');
  });

  it('should read numbers from numbers, bigints and numeric text', () => {
    expect(asNumber(3)).toBe(3);
    expect(asNumber(3n)).toBe(3);
    expect(asNumber('12.5')).toBe(12.5);
    expect(() => asNumber('abc')).toThrow('Expected value to be a number but received string');
    expect(() => asNumber(2n ** 64n)).toThrow(
      'Expected value to be a number but received bigint',
    );
  });

  it('should read bigints', () => {
    expect(asBigInt('9007199254740993')).toBe(9007199254740993n);
    expect(asBigInt(4)).toBe(4n);
    expect(() => asBigInt(1.5)).toThrow('Expected value to be an integer but received number');
  });

  it('should read booleans stored as 0 and 1', () => {
    expect(asBoolean(true)).toBe(true);
    expect(asBoolean(1)).toBe(true);
    expect(asBoolean(0n)).toBe(false);
    expect(() => asBoolean(2)).toThrow('Expected value to be a boolean but received number');
  });

  it('should read dates from text', () => {
    expect(asDate('2024-01-02T00:00:00.000Z').toISOString()).toBe('2024-01-02T00:00:00.000Z');
    expect(() => asDate('not a date')).toThrow('Expected value to be a date but received string');
  });
});

describe('describeType', () => {
  it('should name common value types', () => {
    expect(describeType(null)).toBe('null');
    expect(describeType([1])).toBe('array');
    expect(describeType(new Uint8Array())).toBe('bytes');
    expect(describeType({})).toBe('Object');
  });
});
