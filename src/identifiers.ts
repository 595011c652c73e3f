/**
 * sqlscope Identifiers — quoting and column reference parsing
 *
 * Operator-supplied table and column names only ever reach SQL through
 * quoteIdentifier(). Values (the schema name in live queries) go through
 * placeholders, or quoteLiteral() when rendering a static script.
 */

import { invalidColumnRefError } from './errors.js';
import type { ColumnRef, SqlDialect } from './types.js';

export function quoteIdentifier(name: string, dialect: SqlDialect): string {
  if (dialect === 'mysql2') {
    return '`' + name.replace(/`/g, '``') + '`';
  }
  return '"' + name.replace(/"/g, '""') + '"';
}

export function quoteLiteral(value: string, dialect: SqlDialect): string {
  let escaped = value.replace(/'/g, "''");
  if (dialect === 'mysql2') {
    escaped = escaped.replace(/\\/g, '\\\\');
  }
  return `'${escaped}'`;
}

export function placeholder(dialect: SqlDialect, index: number): string {
  return dialect === 'pg' ? `$${index}` : '?';
}

/**
 * Normalize a list of column references. Accepts an array, a comma-separated
 * string (`orders.status, users.role`), or a Postgres array literal
 * (`{"public.orders.status","public.users.role"}`).
 */
export function parseColumnList(input: string | string[] | undefined): string[] {
  if (input === undefined) return [];

  let entries: string[];
  if (Array.isArray(input)) {
    entries = input;
  } else {
    let text = input.trim();
    if (text.startsWith('{') && text.endsWith('}')) {
      text = text.slice(1, -1);
    }
    entries = text.split(',');
  }

  return entries
    .map(entry => entry.trim().replace(/^"(.*)"$/, '$1').trim())
    .filter(entry => entry.length > 0);
}

/**
 * `table.column` resolves against `defaultSchema`; `schema.table.column` is
 * taken as written.
 */
export function parseColumnRef(entry: string, defaultSchema: string): ColumnRef {
  const parts = entry.split('.').map(p => p.trim());
  if (parts.some(p => p.length === 0)) {
    throw invalidColumnRefError(entry);
  }

  const [first, second, third] = parts;
  if (parts.length === 2 && first !== undefined && second !== undefined) {
    return { schema: defaultSchema, table: first, column: second };
  }
  if (parts.length === 3 && first !== undefined && second !== undefined && third !== undefined) {
    return { schema: first, table: second, column: third };
  }

  throw invalidColumnRefError(entry);
}

export function formatColumnRef(ref: ColumnRef): string {
  return `${ref.schema}.${ref.table}.${ref.column}`;
}
