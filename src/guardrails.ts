/**
 * sqlscope Guardrails — Distinct target verification
 *
 * Checks operator-supplied column refs against the overview before any
 * sampling query runs:
 * - table missing from the schema's base tables
 * - column missing from the table
 * - the same column listed twice
 * Refs in a schema other than the overview's are not checked.
 */

import {
  SqlScopeError,
  columnNotFoundError,
  tableNotFoundError,
} from './errors.js';
import { formatColumnRef } from './identifiers.js';
import type { SqlScopeEventEmitter } from './events.js';
import type { ColumnRef, SchemaOverview } from './types.js';

export interface GuardrailContext {
  enabled: boolean;
  emitter: SqlScopeEventEmitter;
}

/**
 * Throws SqlScopeError (TABLE_NOT_FOUND, COLUMN_NOT_FOUND or GUARDRAIL_BLOCKED)
 * for the first bad ref.
 */
export function checkDistinctTargets(
  ctx: GuardrailContext,
  refs: ColumnRef[],
  overview: SchemaOverview,
): void {
  if (!ctx.enabled) return;

  const seen = new Set<string>();
  const tables = overview.tables.map(t => t.name);

  for (const ref of refs) {
    const label = formatColumnRef(ref);

    if (seen.has(label)) {
      emitAndThrow(ctx, label, new SqlScopeError({
        code: 'GUARDRAIL_BLOCKED',
        message: `Column "${label}" is listed more than once.`,
        fix: `Remove the duplicate entry from the distinct column list.`,
        dialect: overview.dialect,
        target: label,
        operation: 'sampleDistinct',
      }));
    }
    seen.add(label);

    if (ref.schema !== overview.schema) continue;

    if (!tables.includes(ref.table)) {
      emitAndThrow(ctx, label, tableNotFoundError(overview.dialect, label, ref.table, tables));
    }

    const columns = overview.columns
      .filter(c => c.table === ref.table)
      .map(c => c.name);
    if (!columns.includes(ref.column)) {
      emitAndThrow(ctx, label, columnNotFoundError(overview.dialect, label, ref.column, columns));
    }
  }
}

function emitAndThrow(ctx: GuardrailContext, target: string, error: SqlScopeError): never {
  ctx.emitter.emit('guardrail-blocked', {
    target,
    operation: 'sampleDistinct',
    reason: error.message,
  });
  throw error;
}
