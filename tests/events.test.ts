/**
 * Event System Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SqlScopeEventEmitter } from '../src/events.js';
import { invalidColumnRefError } from '../src/errors.js';

describe('SqlScopeEventEmitter', () => {
  it('emits and receives typed events', () => {
    const emitter = new SqlScopeEventEmitter();
    const handler = vi.fn();
    emitter.on('connected', handler);
    emitter.emit('connected', { dialect: 'pg', dbName: 'app', label: 'sqlscope' });
    expect(handler).toHaveBeenCalledWith({ dialect: 'pg', dbName: 'app', label: 'sqlscope' });
  });

  it('supports once listeners', () => {
    const emitter = new SqlScopeEventEmitter();
    const handler = vi.fn();
    emitter.once('closed', handler);
    emitter.emit('closed', { dialect: 'mysql2', label: 'sqlscope', uptimeMs: 5 });
    emitter.emit('closed', { dialect: 'mysql2', label: 'sqlscope', uptimeMs: 6 });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('supports off (removing listeners)', () => {
    const emitter = new SqlScopeEventEmitter();
    const handler = vi.fn();
    emitter.on('slow-query', handler);
    emitter.off('slow-query', handler);
    emitter.emit('slow-query', { label: 'tables public', durationMs: 2000, threshold: 1000 });
    expect(handler).not.toHaveBeenCalled();
  });

  it('delivers guardrail events with their payload', () => {
    const emitter = new SqlScopeEventEmitter();
    const handler = vi.fn();
    emitter.on('guardrail-blocked', handler);
    emitter.emit('guardrail-blocked', { target: 'public.orders.status', operation: 'sampleDistinct', reason: 'duplicate' });
    expect(handler).toHaveBeenCalledWith({ target: 'public.orders.status', operation: 'sampleDistinct', reason: 'duplicate' });
  });

  it('reports errors only to listeners', () => {
    const emitter = new SqlScopeEventEmitter();
    const err = invalidColumnRefError('orders');

    expect(emitter.reportError(err)).toBe(false);

    const handler = vi.fn();
    emitter.on('error', handler);
    expect(emitter.reportError(err, 'mysql2')).toBe(true);
    expect(handler).toHaveBeenCalledWith({
      code: 'INVALID_COLUMN_REF',
      message: err.message,
      fix: err.fix,
      dialect: 'mysql2',
    });
  });
});
