/**
 * Guardrail Tests — Distinct target verification
 */

import { describe, it, expect, vi } from 'vitest';
import { checkDistinctTargets } from '../src/guardrails.js';
import { SqlScopeEventEmitter } from '../src/events.js';
import { SqlScopeError } from '../src/errors.js';
import type { ColumnRef, SchemaOverview } from '../src/types.js';

const overview: SchemaOverview = {
  dialect: 'pg',
  schema: 'public',
  tables: [{ schema: 'public', name: 'orders' }, { schema: 'public', name: 'users' }],
  columns: [
    { schema: 'public', table: 'orders', name: 'id', type: 'integer', nullable: false, default: null, position: 1 },
    { schema: 'public', table: 'orders', name: 'status', type: 'order_status', nullable: false, default: null, position: 2 },
    { schema: 'public', table: 'users', name: 'role', type: 'text', nullable: true, default: null, position: 1 },
  ],
  primaryKeys: [],
  foreignKeys: [],
  enums: [],
};

function ref(table: string, column: string, schema = 'public'): ColumnRef {
  return { schema, table, column };
}

function makeCtx(enabled = true) {
  return { enabled, emitter: new SqlScopeEventEmitter() };
}

function catchError(fn: () => void): SqlScopeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SqlScopeError) return err;
    throw err;
  }
  throw new Error('expected a SqlScopeError');
}

describe('checkDistinctTargets', () => {
  it('allows known columns', () => {
    expect(() => checkDistinctTargets(makeCtx(), [ref('orders', 'status'), ref('users', 'role')], overview))
      .not.toThrow();
  });

  it('blocks an unknown table with a suggestion', () => {
    const err = catchError(() => checkDistinctTargets(makeCtx(), [ref('order', 'status')], overview));
    expect(err.code).toBe('TABLE_NOT_FOUND');
    expect(err.fix).toBe('Did you mean "orders"? Base tables: orders, users.');
  });

  it('blocks an unknown column with a suggestion', () => {
    const err = catchError(() => checkDistinctTargets(makeCtx(), [ref('orders', 'stauts')], overview));
    expect(err.code).toBe('COLUMN_NOT_FOUND');
    expect(err.fix).toBe('Did you mean "status"? Columns: id, status.');
    expect(err.target).toBe('public.orders.stauts');
  });

  it('blocks a column listed twice', () => {
    const err = catchError(() => checkDistinctTargets(makeCtx(), [ref('orders', 'status'), ref('orders', 'status')], overview));
    expect(err.code).toBe('GUARDRAIL_BLOCKED');
    expect(err.message).toContain('Column "public.orders.status" is listed more than once.');
  });

  it('skips refs in another schema', () => {
    expect(() => checkDistinctTargets(makeCtx(), [ref('events', 'kind', 'audit')], overview)).not.toThrow();
  });

  it('does nothing when disabled', () => {
    expect(() => checkDistinctTargets(makeCtx(false), [ref('nope', 'nope')], overview)).not.toThrow();
  });

  it('emits guardrail-blocked event', () => {
    const ctx = makeCtx();
    const handler = vi.fn();
    ctx.emitter.on('guardrail-blocked', handler);

    expect(() => checkDistinctTargets(ctx, [ref('users', 'rol')], overview)).toThrow(SqlScopeError);
    expect(handler).toHaveBeenCalledWith({
      target: 'public.users.rol',
      operation: 'sampleDistinct',
      reason: 'Column "rol" in "public.users.rol" not found. Fix: Did you mean "role"? Columns: role.',
    });
  });
});
