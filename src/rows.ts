/**
 * sqlscope Row Schemas — zod validation for catalog result rows
 *
 * Drivers disagree on catalog column types: pg returns bigint counts as
 * strings, MySQL 8 returns some INFORMATION_SCHEMA text columns as Buffers.
 * These schemas coerce both into the shapes the adapter maps from.
 */

import { z } from 'zod';
import { SqlScopeError } from './errors.js';
import type { ScalarValue, SqlDialect } from './types.js';

const text = z.preprocess(
  v => (Buffer.isBuffer(v) ? v.toString('utf8') : v),
  z.string(),
);

const nullableText = z.preprocess(
  v => (Buffer.isBuffer(v) ? v.toString('utf8') : v),
  z.string().nullable(),
);

const count = z.coerce.number().int().nonnegative();

export const tableRowSchema = z.object({
  table_schema: text,
  table_name: text,
});

export const columnRowSchema = z.object({
  table_schema: text,
  table_name: text,
  column_name: text,
  data_type: text,
  udt_name: nullableText.optional(),
  is_nullable: text,
  column_default: nullableText.optional(),
  ordinal_position: count,
});

export const primaryKeyRowSchema = z.object({
  table_schema: text,
  table_name: text,
  constraint_name: text,
  column_name: text,
  ordinal_position: count,
});

export const foreignKeyRowSchema = z.object({
  table_schema: text,
  table_name: text,
  column_name: text,
  foreign_table_schema: text,
  foreign_table_name: text,
  foreign_column_name: text,
  constraint_name: text,
});

export const enumRowSchema = z.object({
  schema_name: text,
  enum_name: text,
  enum_value: text,
});

export const mysqlEnumRowSchema = z.object({
  schema_name: text,
  table_name: text,
  column_name: text,
  column_type: text,
});

export const currentSchemaRowSchema = z.object({
  name: nullableText,
});

export const distinctRowSchema = z.object({
  value: z.unknown(),
  freq: count,
});

/**
 * Parse every row against `schema`. The first mismatch raises QUERY_ERROR
 * naming the statement label and the offending field.
 */
export function parseRows<S extends z.ZodTypeAny>(
  schema: S,
  rows: Record<string, unknown>[],
  label: string,
  dialect: SqlDialect,
): z.infer<S>[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown field';
      throw new SqlScopeError({
        code: 'QUERY_ERROR',
        message: `Unexpected row ${index} from "${label}" (${where}).`,
        fix: `The catalog returned an unexpected shape. Check the server version is supported (PostgreSQL 10+, MySQL 8+ or MariaDB 10.3+).`,
        dialect,
        operation: label,
      });
    }
    return result.data;
  });
}

/** Reduce a sampled driver value to something JSON- and table-printable. */
export function normalizeValue(value: unknown): ScalarValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) {
    // mysql2 decodes zero dates (0000-00-00) as Invalid Date
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return JSON.stringify(value);
}
