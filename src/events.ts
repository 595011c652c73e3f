/**
 * sqlscope Event System — Typed event emitter
 *
 * Connection lifecycle, per-statement timing, and guardrail events flow through this.
 */

import { EventEmitter } from 'events';
import type { SqlScopeError } from './errors.js';
import type { SqlDialect, SqlScopeEvents, SqlScopeListener as Listener } from './types.js';

export class SqlScopeEventEmitter extends EventEmitter {
  on<E extends keyof SqlScopeEvents>(event: E, listener: Listener<E>): this {
    return super.on(event, listener);
  }

  once<E extends keyof SqlScopeEvents>(event: E, listener: Listener<E>): this {
    return super.once(event, listener);
  }

  emit<E extends keyof SqlScopeEvents>(event: E, payload: SqlScopeEvents[E]): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof SqlScopeEvents>(event: E, listener: Listener<E>): this {
    return super.off(event, listener);
  }

  /**
   * Report a failed call on `error`. Skipped without listeners, where
   * EventEmitter would throw the payload instead.
   */
  reportError(err: SqlScopeError, dialect: SqlDialect | null = err.dialect): boolean {
    if (this.listenerCount('error') === 0) return false;
    return this.emit('error', {
      code: err.code,
      message: err.message,
      fix: err.fix,
      dialect,
    });
  }
}
