/**
 * sqlscope Logger — Structured statement logging
 *
 * Emits a `query` event per statement with timing and receipt, plus the SQL
 * text in verbose mode, and `slow-query` past the threshold.
 */

import type { QueryReceipt } from './types.js';
import type { SqlScopeEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowQueryMs: number;
}

export class SqlScopeLogger {
  private config: LoggerConfig;
  private emitter: SqlScopeEventEmitter;

  constructor(config: LoggerConfig, emitter: SqlScopeEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  logQuery(receipt: QueryReceipt, sql?: string): void {
    if (!this.config.enabled) return;

    this.emitter.emit('query', {
      label: receipt.label,
      durationMs: receipt.duration,
      rowCount: receipt.rowCount,
      sql: this.config.verbose ? sql : undefined,
      receipt,
    });

    if (receipt.duration >= this.config.slowQueryMs) {
      this.emitter.emit('slow-query', {
        label: receipt.label,
        durationMs: receipt.duration,
        threshold: this.config.slowQueryMs,
      });
    }
  }
}
