/**
 * Error System Tests — Normalization + Self-Correcting Messages
 */

import { describe, it, expect } from 'vitest';
import {
  SqlScopeError,
  ERROR_RETRYABLE,
  mapSqlError,
  invalidColumnRefError,
  tableNotFoundError,
  columnNotFoundError,
  findClosestMatch,
  levenshtein,
} from '../src/errors.js';

function driverError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('SqlScopeError', () => {
  it('creates error with all fields', () => {
    const err = new SqlScopeError({
      code: 'TABLE_NOT_FOUND',
      message: 'Table missing.',
      fix: 'Run sqlscope overview.',
      dialect: 'pg',
      target: 'public.orders.status',
      operation: 'sampleDistinct',
    });

    expect(err.code).toBe('TABLE_NOT_FOUND');
    expect(err.dialect).toBe('pg');
    expect(err.target).toBe('public.orders.status');
    expect(err.operation).toBe('sampleDistinct');
    expect(err.retryable).toBe(false);
    expect(err.fix).toBe('Run sqlscope overview.');
    expect(err.message).toBe('Table missing. Fix: Run sqlscope overview.');
    expect(err.timestamp).toBeInstanceOf(Date);
    expect(err.name).toBe('SqlScopeError');
  });

  it('defaults dialect to null', () => {
    const err = new SqlScopeError({ code: 'CONFIG_INVALID', message: 'bad', fix: 'fix' });
    expect(err.dialect).toBeNull();
  });

  it('takes retryable from the code table unless given', () => {
    expect(new SqlScopeError({ code: 'TIMEOUT', message: 'm', fix: 'f' }).retryable).toBe(true);
    expect(new SqlScopeError({ code: 'QUERY_ERROR', message: 'm', fix: 'f' }).retryable).toBe(false);
    expect(new SqlScopeError({ code: 'TIMEOUT', message: 'm', fix: 'f', retryable: false }).retryable).toBe(false);
  });

  it('marks only transient codes as retryable', () => {
    const retryable = Object.entries(ERROR_RETRYABLE).filter(([, v]) => v).map(([k]) => k).sort();
    expect(retryable).toEqual(['CONNECTION_FAILED', 'POOL_EXHAUSTED', 'TIMEOUT']);
  });
});

describe('mapSqlError', () => {
  it('maps pg 42P01 to TABLE_NOT_FOUND', () => {
    const err = mapSqlError('pg', driverError('42P01', 'relation "ordrs" does not exist'), 'public.ordrs.status', 'distinct');
    expect(err.code).toBe('TABLE_NOT_FOUND');
    expect(err.message).toContain('Table not found while reading "public.ordrs.status".');
    expect(err.dialect).toBe('pg');
    expect(err.target).toBe('public.ordrs.status');
    expect(err.operation).toBe('distinct');
  });

  it('maps ER_NO_SUCH_TABLE to TABLE_NOT_FOUND', () => {
    expect(mapSqlError('mysql2', driverError('ER_NO_SUCH_TABLE', "Table 'shop.x' doesn't exist")).code).toBe('TABLE_NOT_FOUND');
  });

  it('maps undefined columns to COLUMN_NOT_FOUND', () => {
    expect(mapSqlError('pg', driverError('42703', 'column "x" does not exist')).code).toBe('COLUMN_NOT_FOUND');
    expect(mapSqlError('mysql2', driverError('ER_BAD_FIELD_ERROR', "Unknown column 'x'")).code).toBe('COLUMN_NOT_FOUND');
  });

  it('maps unknown schemas and databases to SCHEMA_NOT_FOUND', () => {
    expect(mapSqlError('pg', driverError('3F000', 'schema "nope" does not exist')).code).toBe('SCHEMA_NOT_FOUND');
    expect(mapSqlError('mysql2', driverError('ER_BAD_DB_ERROR', "Unknown database 'nope'")).code).toBe('SCHEMA_NOT_FOUND');
  });

  it('maps authentication failures', () => {
    expect(mapSqlError('pg', driverError('28P01', 'password authentication failed for user "app"')).code).toBe('AUTHENTICATION_FAILED');
    expect(mapSqlError('mysql2', driverError('ER_ACCESS_DENIED_ERROR', 'Access denied')).code).toBe('AUTHENTICATION_FAILED');
    expect(mapSqlError('pg', new Error('password authentication failed for user "app"')).code).toBe('AUTHENTICATION_FAILED');
  });

  it('maps refused connections to CONNECTION_FAILED and marks them retryable', () => {
    const err = mapSqlError('pg', driverError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432'));
    expect(err.code).toBe('CONNECTION_FAILED');
    expect(err.retryable).toBe(true);
    expect(mapSqlError('mysql2', new Error('getaddrinfo: connect ENOTFOUND db.invalid')).code).toBe('CONNECTION_FAILED');
  });

  it('maps statement timeouts to TIMEOUT', () => {
    expect(mapSqlError('pg', driverError('57014', 'canceling statement due to statement timeout')).code).toBe('TIMEOUT');
    expect(mapSqlError('mysql2', driverError('PROTOCOL_SEQUENCE_TIMEOUT', 'Query inactivity timeout')).code).toBe('TIMEOUT');
  });

  it('maps syntax errors to QUERY_ERROR with the driver message', () => {
    const err = mapSqlError('pg', driverError('42601', 'syntax error at or near "FROM"'), 'x');
    expect(err.code).toBe('QUERY_ERROR');
    expect(err.message).toContain('syntax error at or near "FROM"');
  });

  it('maps pool acquisition timeouts to POOL_EXHAUSTED', () => {
    expect(mapSqlError('pg', new Error('timeout exceeded when trying to connect')).code).toBe('POOL_EXHAUSTED');
  });

  it('falls back to INTERNAL_ERROR with the dialect name', () => {
    const err = mapSqlError('mysql2', new Error('something odd'), 'shop.products.size');
    expect(err.code).toBe('INTERNAL_ERROR');
    expect(err.message).toBe('MySQL error on "shop.products.size": something odd Fix: Check the original error for details.');
  });

  it('handles non-Error values', () => {
    const err = mapSqlError('pg', 'boom');
    expect(err.code).toBe('INTERNAL_ERROR');
    expect(err.message).toContain('PostgreSQL error on "unknown": boom');
  });

  it('passes SqlScopeError through unchanged', () => {
    const original = invalidColumnRefError('orders');
    expect(mapSqlError('pg', original)).toBe(original);
  });

  it('keeps the driver error', () => {
    const driver = driverError('42P01', 'missing');
    expect(mapSqlError('pg', driver).originalError).toBe(driver);
  });
});

describe('helper errors', () => {
  it('invalidColumnRefError names the entry and both accepted forms', () => {
    const err = invalidColumnRefError('orders');
    expect(err.code).toBe('INVALID_COLUMN_REF');
    expect(err.message).toContain('Invalid column reference "orders".');
    expect(err.fix).toContain('"schema.table.column"');
    expect(err.target).toBe('orders');
  });

  it('tableNotFoundError suggests the closest table', () => {
    const err = tableNotFoundError('pg', 'public.ordrs.status', 'ordrs', ['orders', 'users']);
    expect(err.code).toBe('TABLE_NOT_FOUND');
    expect(err.message).toBe('Table "ordrs" in "public.ordrs.status" not found. Fix: Did you mean "orders"? Base tables: orders, users.');
    expect(err.operation).toBe('sampleDistinct');
  });

  it('tableNotFoundError reports an empty schema', () => {
    const err = tableNotFoundError('pg', 'public.a.b', 'a', []);
    expect(err.fix).toBe('The schema has no base tables.');
  });

  it('columnNotFoundError lists the columns without a suggestion when none is close', () => {
    const err = columnNotFoundError('mysql2', 'shop.products.colour', 'colour', ['id', 'size']);
    expect(err.code).toBe('COLUMN_NOT_FOUND');
    expect(err.fix).toBe('Columns: id, size.');
  });
});

describe('findClosestMatch', () => {
  it('finds close matches case-insensitively', () => {
    expect(findClosestMatch('STATSU', ['status', 'role'])).toBe('status');
  });

  it('returns null beyond distance 3', () => {
    expect(findClosestMatch('completely_different', ['status', 'role'])).toBeNull();
  });
});

describe('levenshtein', () => {
  it('computes edit distance', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });
});
