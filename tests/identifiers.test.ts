/**
 * Identifier Tests — quoting and column reference parsing
 */

import { describe, it, expect } from 'vitest';
import {
  quoteIdentifier,
  quoteLiteral,
  placeholder,
  parseColumnList,
  parseColumnRef,
  formatColumnRef,
} from '../src/identifiers.js';
import { SqlScopeError } from '../src/errors.js';

describe('quoteIdentifier', () => {
  it('uses double quotes for Postgres and doubles embedded quotes', () => {
    expect(quoteIdentifier('orders', 'pg')).toBe('"orders"');
    expect(quoteIdentifier('we"ird', 'pg')).toBe('"we""ird"');
  });

  it('uses backticks for MySQL and doubles embedded backticks', () => {
    expect(quoteIdentifier('orders', 'mysql2')).toBe('`orders`');
    expect(quoteIdentifier('we`ird', 'mysql2')).toBe('`we``ird`');
  });
});

describe('quoteLiteral', () => {
  it('doubles single quotes', () => {
    expect(quoteLiteral("it's", 'pg')).toBe("'it''s'");
  });

  it('escapes backslashes for MySQL only', () => {
    expect(quoteLiteral('a\\b', 'mysql2')).toBe("'a\\\\b'");
    expect(quoteLiteral('a\\b', 'pg')).toBe("'a\\b'");
  });
});

describe('placeholder', () => {
  it('is positional for Postgres and ? for MySQL', () => {
    expect(placeholder('pg', 1)).toBe('$1');
    expect(placeholder('mysql2', 1)).toBe('?');
  });
});

describe('parseColumnList', () => {
  it('returns [] for undefined and empty input', () => {
    expect(parseColumnList(undefined)).toEqual([]);
    expect(parseColumnList('')).toEqual([]);
    expect(parseColumnList('{}')).toEqual([]);
  });

  it('splits comma-separated text and trims entries', () => {
    expect(parseColumnList(' orders.status , users.role,, ')).toEqual(['orders.status', 'users.role']);
  });

  it('reads a Postgres array literal', () => {
    expect(parseColumnList('{"public.orders.status","public.users.role"}'))
      .toEqual(['public.orders.status', 'public.users.role']);
  });

  it('cleans array entries', () => {
    expect(parseColumnList([' "orders.status" ', ''])).toEqual(['orders.status']);
  });
});

describe('parseColumnRef', () => {
  it('resolves table.column against the default schema', () => {
    expect(parseColumnRef('orders.status', 'public')).toEqual({ schema: 'public', table: 'orders', column: 'status' });
  });

  it('takes schema.table.column as written', () => {
    expect(parseColumnRef('sales.orders.status', 'public')).toEqual({ schema: 'sales', table: 'orders', column: 'status' });
  });

  it('rejects a bare name, too many parts and empty segments', () => {
    for (const entry of ['status', 'a.b.c.d', 'orders.', '.status']) {
      expect(() => parseColumnRef(entry, 'public')).toThrow(SqlScopeError);
    }
  });

  it('reports INVALID_COLUMN_REF', () => {
    try {
      parseColumnRef('status', 'public');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SqlScopeError);
      expect(err instanceof SqlScopeError && err.code).toBe('INVALID_COLUMN_REF');
    }
  });
});

describe('formatColumnRef', () => {
  it('joins the three parts', () => {
    expect(formatColumnRef({ schema: 'public', table: 'orders', column: 'status' })).toBe('public.orders.status');
  });
});
