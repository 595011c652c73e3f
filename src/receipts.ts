/**
 * sqlscope Query Receipts — one per introspection or sampling statement
 */

import type { QueryReceipt, SqlDialect } from './types.js';

export function createQueryReceipt(opts: {
  label: string;
  dialect: SqlDialect;
  startTime: number;
  rowCount?: number;
}): QueryReceipt {
  return {
    label: opts.label,
    dialect: opts.dialect,
    rowCount: opts.rowCount ?? 0,
    duration: Date.now() - opts.startTime,
  };
}
