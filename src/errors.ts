/**
 * sqlscope Error System — Normalized errors with fix instructions
 *
 * Driver errors from pg and mysql2 are caught, normalized into SqlScopeError
 * instances, and carry a human/AI-readable fix. Nothing here retries:
 * `retryable` is a hint for the caller.
 */

import type { SqlDialect, SqlScopeErrorCode } from './types.js';

// ─── SqlScopeError ───────────────────────────────────────────────────────────

export class SqlScopeError extends Error {
  readonly code: SqlScopeErrorCode;
  readonly dialect: SqlDialect | null;
  readonly originalError: unknown;
  readonly target?: string;
  readonly operation?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: SqlScopeErrorCode;
    message: string;
    fix: string;
    dialect?: SqlDialect | null;
    originalError?: unknown;
    target?: string;
    operation?: string;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'SqlScopeError';
    this.code = opts.code;
    this.dialect = opts.dialect ?? null;
    this.originalError = opts.originalError;
    this.target = opts.target;
    this.operation = opts.operation;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<SqlScopeErrorCode, boolean> = {
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  POOL_EXHAUSTED: true,
  SCHEMA_NOT_FOUND: false,
  TABLE_NOT_FOUND: false,
  COLUMN_NOT_FOUND: false,
  INVALID_COLUMN_REF: false,
  CONFIG_INVALID: false,
  UNSUPPORTED_DIALECT: false,
  GUARDRAIL_BLOCKED: false,
  QUERY_ERROR: false,
  INTERNAL_ERROR: false,
};

// ─── Driver Error Mapping ────────────────────────────────────────────────────

function errorCode(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const code = err.code;
    if (typeof code === 'string') return code;
    if (typeof code === 'number') return String(code);
  }
  return '';
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

export function mapSqlError(
  dialect: SqlDialect,
  err: unknown,
  target?: string,
  operation?: string,
): SqlScopeError {
  if (err instanceof SqlScopeError) return err;

  const code = errorCode(err);
  const message = errorMessage(err);
  const on = target ?? 'unknown';
  const base = { dialect, originalError: err, target, operation };

  // pg 42P01 undefined_table, MySQL 1146
  if (code === '42P01' || code === 'ER_NO_SUCH_TABLE') {
    return new SqlScopeError({
      ...base,
      code: 'TABLE_NOT_FOUND',
      message: `Table not found while reading "${on}".`,
      fix: `Run "sqlscope overview" to list the base tables of the schema, then correct the table name.`,
    });
  }

  // pg 42703 undefined_column, MySQL 1054
  if (code === '42703' || code === 'ER_BAD_FIELD_ERROR') {
    return new SqlScopeError({
      ...base,
      code: 'COLUMN_NOT_FOUND',
      message: `Column not found while reading "${on}".`,
      fix: `Check the column name against the COLUMNS section of "sqlscope overview".`,
    });
  }

  // pg 3F000 invalid_schema_name, MySQL 1049
  if (code === '3F000' || code === 'ER_BAD_DB_ERROR') {
    return new SqlScopeError({
      ...base,
      code: 'SCHEMA_NOT_FOUND',
      message: `Schema or database not found while reading "${on}".`,
      fix: `Pass an existing schema with --schema, or fix the database name in the connection URI.`,
    });
  }

  if (code === '28P01' || code === '28000' || code === 'ER_ACCESS_DENIED_ERROR'
    || message.includes('password authentication failed')) {
    return new SqlScopeError({
      ...base,
      code: 'AUTHENTICATION_FAILED',
      message: `Database authentication failed.`,
      fix: `Check the username and password in the connection URI.`,
    });
  }

  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND'
    || message.includes('ECONNREFUSED') || message.includes('connect ENOTFOUND')) {
    return new SqlScopeError({
      ...base,
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to the database.`,
      fix: `Verify the connection URI and that the database server is running and reachable.`,
    });
  }

  // pg 57014 query_canceled (statement_timeout), mysql2 query timeout
  if (code === '57014' || code === 'PROTOCOL_SEQUENCE_TIMEOUT' || code === 'ER_QUERY_TIMEOUT'
    || message.includes('canceling statement due to statement timeout')) {
    return new SqlScopeError({
      ...base,
      code: 'TIMEOUT',
      message: `Query timed out while reading "${on}".`,
      fix: `Lower the distinct limit, sample fewer columns, or raise statementTimeoutMs.`,
    });
  }

  if (code === '42601' || code === 'ER_PARSE_ERROR') {
    return new SqlScopeError({
      ...base,
      code: 'QUERY_ERROR',
      message: `The database rejected the generated SQL for "${on}": ${message}`,
      fix: `Check that the column reference names a real, plain column.`,
    });
  }

  if (message.includes('timeout exceeded') && message.includes('connect')) {
    return new SqlScopeError({
      ...base,
      code: 'POOL_EXHAUSTED',
      message: `Timed out waiting for a pooled connection.`,
      fix: `Use pool: 'high', or close other sessions holding connections.`,
    });
  }

  return new SqlScopeError({
    ...base,
    code: 'INTERNAL_ERROR',
    message: `${dialect === 'pg' ? 'PostgreSQL' : 'MySQL'} error on "${on}": ${message}`,
    fix: `Check the original error for details.`,
  });
}

// ─── Helper Errors ───────────────────────────────────────────────────────────

export function invalidColumnRefError(entry: string): SqlScopeError {
  return new SqlScopeError({
    code: 'INVALID_COLUMN_REF',
    message: `Invalid column reference "${entry}".`,
    fix: `Use "table.column" or "schema.table.column", e.g. "orders.status" or "public.orders.status".`,
    target: entry,
  });
}

export function tableNotFoundError(
  dialect: SqlDialect,
  ref: string,
  table: string,
  tables: string[],
): SqlScopeError {
  const suggestion = findClosestMatch(table, tables);
  const known = tables.length > 0
    ? `Base tables: ${tables.join(', ')}.`
    : 'The schema has no base tables.';

  return new SqlScopeError({
    code: 'TABLE_NOT_FOUND',
    message: `Table "${table}" in "${ref}" not found.`,
    fix: suggestion ? `Did you mean "${suggestion}"? ${known}` : known,
    dialect,
    target: ref,
    operation: 'sampleDistinct',
  });
}

export function columnNotFoundError(
  dialect: SqlDialect,
  ref: string,
  column: string,
  columns: string[],
): SqlScopeError {
  const suggestion = findClosestMatch(column, columns);
  const known = `Columns: ${columns.join(', ')}.`;

  return new SqlScopeError({
    code: 'COLUMN_NOT_FOUND',
    message: `Column "${column}" in "${ref}" not found.`,
    fix: suggestion ? `Did you mean "${suggestion}"? ${known}` : known,
    dialect,
    target: ref,
    operation: 'sampleDistinct',
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function findClosestMatch(input: string, candidates: string[]): string | null {
  let bestMatch: string | null = null;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDistance && dist <= 3) {
      bestDistance = dist;
      bestMatch = candidate;
    }
  }

  return bestMatch;
}

export function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        (prev[j] ?? 0) + 1,
        (curr[j - 1] ?? 0) + 1,
        (prev[j - 1] ?? 0) + cost,
      );
    }
    prev = curr;
  }

  return prev[b.length] ?? 0;
}
