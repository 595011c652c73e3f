/**
 * sqlscope Query Builders — information_schema introspection and distinct sampling
 *
 * Every builder takes the SQL expression for the schema rather than the name
 * itself: a placeholder for live queries, a quoted literal or a session
 * variable (`@db_name`, `:'schema_name'`) for rendered scripts. Result columns
 * are aliased to the same lower-case names on both dialects so one row schema
 * reads either.
 */

import { quoteIdentifier } from './identifiers.js';
import type { ColumnRef, SqlDialect } from './types.js';

export interface OverviewQueries {
  tables: string;
  columns: string;
  primaryKeys: string;
  foreignKeys: string;
  /**
   * pg: one row per enum label. mysql: one row per `enum(...)` column, whose
   * labels are parsed out of COLUMN_TYPE.
   */
  enums: string;
}

export function buildOverviewQueries(dialect: SqlDialect, schemaExpr: string): OverviewQueries {
  return dialect === 'pg' ? pgOverview(schemaExpr) : mysqlOverview(schemaExpr);
}

function pgOverview(s: string): OverviewQueries {
  return {
    tables: [
      'SELECT table_schema, table_name',
      'FROM information_schema.tables',
      `WHERE table_schema = ${s} AND table_type = 'BASE TABLE'`,
      'ORDER BY table_name',
    ].join('\n'),

    columns: [
      'SELECT c.table_schema,',
      '       c.table_name,',
      '       c.column_name,',
      '       c.data_type,',
      '       c.udt_name,',
      '       c.is_nullable,',
      '       c.column_default,',
      '       c.ordinal_position',
      'FROM information_schema.columns c',
      'JOIN information_schema.tables t',
      '  ON c.table_schema = t.table_schema AND c.table_name = t.table_name',
      `WHERE c.table_schema = ${s} AND t.table_type = 'BASE TABLE'`,
      'ORDER BY c.table_name, c.ordinal_position',
    ].join('\n'),

    primaryKeys: [
      'SELECT kc.table_schema,',
      '       kc.table_name,',
      '       kc.constraint_name,',
      '       kc.column_name,',
      '       kc.ordinal_position',
      'FROM information_schema.table_constraints tc',
      'JOIN information_schema.key_column_usage kc',
      '  ON kc.table_schema = tc.table_schema',
      ' AND kc.table_name = tc.table_name',
      ' AND kc.constraint_name = tc.constraint_name',
      `WHERE tc.table_schema = ${s} AND tc.constraint_type = 'PRIMARY KEY'`,
      'ORDER BY kc.table_name, kc.ordinal_position',
    ].join('\n'),

    foreignKeys: [
      'SELECT tc.table_schema,',
      '       tc.table_name,',
      '       kcu.column_name,',
      '       ccu.table_schema AS foreign_table_schema,',
      '       ccu.table_name   AS foreign_table_name,',
      '       ccu.column_name  AS foreign_column_name,',
      '       tc.constraint_name',
      'FROM information_schema.table_constraints AS tc',
      'JOIN information_schema.key_column_usage AS kcu',
      '  ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema',
      'JOIN information_schema.constraint_column_usage AS ccu',
      '  ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema',
      `WHERE tc.table_schema = ${s} AND tc.constraint_type = 'FOREIGN KEY'`,
      'ORDER BY tc.table_name, kcu.ordinal_position',
    ].join('\n'),

    enums: [
      'SELECT n.nspname AS schema_name,',
      '       t.typname AS enum_name,',
      '       e.enumlabel AS enum_value',
      'FROM pg_type t',
      'JOIN pg_enum e ON t.oid = e.enumtypid',
      'JOIN pg_catalog.pg_namespace n ON n.oid = t.typnamespace',
      `WHERE n.nspname = ${s}`,
      'ORDER BY t.typname, e.enumsortorder',
    ].join('\n'),
  };
}

function mysqlOverview(s: string): OverviewQueries {
  return {
    tables: [
      'SELECT TABLE_SCHEMA AS table_schema, TABLE_NAME AS table_name',
      'FROM INFORMATION_SCHEMA.TABLES',
      `WHERE TABLE_SCHEMA = ${s} AND TABLE_TYPE = 'BASE TABLE'`,
      'ORDER BY TABLE_NAME',
    ].join('\n'),

    columns: [
      'SELECT c.TABLE_SCHEMA     AS table_schema,',
      '       c.TABLE_NAME       AS table_name,',
      '       c.COLUMN_NAME      AS column_name,',
      '       c.COLUMN_TYPE      AS data_type,',
      '       c.DATA_TYPE        AS udt_name,',
      '       c.IS_NULLABLE      AS is_nullable,',
      '       c.COLUMN_DEFAULT   AS column_default,',
      '       c.ORDINAL_POSITION AS ordinal_position',
      'FROM INFORMATION_SCHEMA.COLUMNS c',
      '         JOIN INFORMATION_SCHEMA.TABLES t',
      '              ON c.TABLE_SCHEMA = t.TABLE_SCHEMA AND c.TABLE_NAME = t.TABLE_NAME',
      `WHERE c.TABLE_SCHEMA = ${s} AND t.TABLE_TYPE = 'BASE TABLE'`,
      'ORDER BY c.TABLE_NAME, c.ORDINAL_POSITION',
    ].join('\n'),

    primaryKeys: [
      'SELECT kcu.TABLE_SCHEMA     AS table_schema,',
      '       kcu.TABLE_NAME       AS table_name,',
      '       kcu.CONSTRAINT_NAME  AS constraint_name,',
      '       kcu.COLUMN_NAME      AS column_name,',
      '       kcu.ORDINAL_POSITION AS ordinal_position',
      'FROM INFORMATION_SCHEMA.TABLE_CONSTRAINTS tc',
      '         JOIN INFORMATION_SCHEMA.KEY_COLUMN_USAGE kcu',
      '              ON kcu.CONSTRAINT_NAME = tc.CONSTRAINT_NAME',
      '                  AND kcu.TABLE_SCHEMA = tc.TABLE_SCHEMA',
      '                  AND kcu.TABLE_NAME = tc.TABLE_NAME',
      `WHERE tc.TABLE_SCHEMA = ${s} AND tc.CONSTRAINT_TYPE = 'PRIMARY KEY'`,
      'ORDER BY kcu.TABLE_NAME, kcu.ORDINAL_POSITION',
    ].join('\n'),

    foreignKeys: [
      'SELECT kcu.TABLE_SCHEMA            AS table_schema,',
      '       kcu.TABLE_NAME              AS table_name,',
      '       kcu.COLUMN_NAME             AS column_name,',
      '       kcu.REFERENCED_TABLE_SCHEMA AS foreign_table_schema,',
      '       kcu.REFERENCED_TABLE_NAME   AS foreign_table_name,',
      '       kcu.REFERENCED_COLUMN_NAME  AS foreign_column_name,',
      '       kcu.CONSTRAINT_NAME         AS constraint_name',
      'FROM INFORMATION_SCHEMA.KEY_COLUMN_USAGE kcu',
      '         JOIN INFORMATION_SCHEMA.TABLE_CONSTRAINTS tc',
      '              ON tc.CONSTRAINT_NAME = kcu.CONSTRAINT_NAME',
      '                  AND tc.TABLE_SCHEMA = kcu.TABLE_SCHEMA',
      '                  AND tc.TABLE_NAME = kcu.TABLE_NAME',
      `WHERE kcu.TABLE_SCHEMA = ${s}`,
      '  AND kcu.REFERENCED_TABLE_NAME IS NOT NULL',
      "  AND tc.CONSTRAINT_TYPE = 'FOREIGN KEY'",
      'ORDER BY kcu.TABLE_NAME, kcu.ORDINAL_POSITION',
    ].join('\n'),

    enums: [
      'SELECT TABLE_SCHEMA AS schema_name,',
      '       TABLE_NAME   AS table_name,',
      '       COLUMN_NAME  AS column_name,',
      '       COLUMN_TYPE  AS column_type',
      'FROM INFORMATION_SCHEMA.COLUMNS',
      `WHERE TABLE_SCHEMA = ${s} AND DATA_TYPE = 'enum'`,
      'ORDER BY TABLE_NAME, ORDINAL_POSITION',
    ].join('\n'),
  };
}

/**
 * Value/frequency query for one column. An empty `ref.schema` leaves the
 * table unqualified (MySQL's current database).
 */
export function buildDistinctQuery(dialect: SqlDialect, ref: ColumnRef, limit: number): string {
  const col = quoteIdentifier(ref.column, dialect);
  const table = ref.schema
    ? `${quoteIdentifier(ref.schema, dialect)}.${quoteIdentifier(ref.table, dialect)}`
    : quoteIdentifier(ref.table, dialect);

  let sql = `SELECT ${col} AS value, COUNT(*) AS freq FROM ${table} GROUP BY ${col} ORDER BY freq DESC`;
  if (limit > 0) {
    sql += ` LIMIT ${Math.floor(limit)}`;
  }
  return sql;
}

export function buildCurrentSchemaQuery(dialect: SqlDialect): string {
  return dialect === 'pg'
    ? 'SELECT current_schema() AS name'
    : 'SELECT DATABASE() AS name';
}
