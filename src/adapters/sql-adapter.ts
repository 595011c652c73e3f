/**
 * sqlscope SQL Adapter
 *
 * Wraps core/db/sql.ts. Uses queries.ts for the catalog statements and
 * rows.ts to validate what comes back. Every statement is timed, logged,
 * and error-mapped with its target.
 */

import type { z } from 'zod';
import type { IntrospectionAdapter } from './adapter.js';
import type {
  ColumnInfo,
  ColumnRef,
  DistinctValue,
  EnumType,
  ForeignKey,
  PrimaryKeyColumn,
  SqlDialect,
  TableInfo,
} from '../types.js';
import type { SqlClient } from '../core/db/sql.js';
import type { SqlScopeLogger } from '../logger.js';
import { mapSqlError } from '../errors.js';
import { createQueryReceipt } from '../receipts.js';
import { formatColumnRef, placeholder } from '../identifiers.js';
import {
  buildCurrentSchemaQuery,
  buildDistinctQuery,
  buildOverviewQueries,
} from '../queries.js';
import type { OverviewQueries } from '../queries.js';
import {
  columnRowSchema,
  currentSchemaRowSchema,
  distinctRowSchema,
  enumRowSchema,
  foreignKeyRowSchema,
  mysqlEnumRowSchema,
  normalizeValue,
  parseRows,
  primaryKeyRowSchema,
  tableRowSchema,
} from '../rows.js';

export class SqlAdapter implements IntrospectionAdapter {
  readonly dialect: SqlDialect;

  private client: SqlClient;
  private logger: SqlScopeLogger;
  private queries: OverviewQueries;

  constructor(client: SqlClient, logger: SqlScopeLogger) {
    this.client = client;
    this.logger = logger;
    this.dialect = client.dialect;
    this.queries = buildOverviewQueries(this.dialect, placeholder(this.dialect, 1));
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  async currentSchema(): Promise<string | null> {
    const rows = await this.run('currentSchema', buildCurrentSchemaQuery(this.dialect), [], currentSchemaRowSchema);
    return rows[0]?.name ?? null;
  }

  async listTables(schema: string): Promise<TableInfo[]> {
    const rows = await this.run('tables', this.queries.tables, [schema], tableRowSchema, schema);
    return rows.map(r => ({ schema: r.table_schema, name: r.table_name }));
  }

  async listColumns(schema: string): Promise<ColumnInfo[]> {
    const rows = await this.run('columns', this.queries.columns, [schema], columnRowSchema, schema);
    return rows.map(r => ({
      schema: r.table_schema,
      table: r.table_name,
      name: r.column_name,
      type: this.dialect === 'pg' && r.data_type === 'USER-DEFINED' && r.udt_name
        ? r.udt_name
        : r.data_type,
      nullable: r.is_nullable === 'YES',
      default: r.column_default ?? null,
      position: r.ordinal_position,
    }));
  }

  async listPrimaryKeys(schema: string): Promise<PrimaryKeyColumn[]> {
    const rows = await this.run('primaryKeys', this.queries.primaryKeys, [schema], primaryKeyRowSchema, schema);
    return rows.map(r => ({
      schema: r.table_schema,
      table: r.table_name,
      constraint: r.constraint_name,
      column: r.column_name,
      position: r.ordinal_position,
    }));
  }

  async listForeignKeys(schema: string): Promise<ForeignKey[]> {
    const rows = await this.run('foreignKeys', this.queries.foreignKeys, [schema], foreignKeyRowSchema, schema);
    return rows.map(r => ({
      schema: r.table_schema,
      table: r.table_name,
      column: r.column_name,
      foreignSchema: r.foreign_table_schema,
      foreignTable: r.foreign_table_name,
      foreignColumn: r.foreign_column_name,
      constraint: r.constraint_name,
    }));
  }

  async listEnums(schema: string): Promise<EnumType[]> {
    if (this.dialect === 'mysql2') {
      const rows = await this.run('enums', this.queries.enums, [schema], mysqlEnumRowSchema, schema);
      return rows.map(r => ({
        schema: r.schema_name,
        name: `${r.table_name}.${r.column_name}`,
        values: parseEnumLabels(r.column_type),
      }));
    }

    const rows = await this.run('enums', this.queries.enums, [schema], enumRowSchema, schema);
    const enums: EnumType[] = [];
    for (const r of rows) {
      const last = enums[enums.length - 1];
      if (last && last.name === r.enum_name && last.schema === r.schema_name) {
        last.values.push(r.enum_value);
      } else {
        enums.push({ schema: r.schema_name, name: r.enum_name, values: [r.enum_value] });
      }
    }
    return enums;
  }

  async sampleDistinct(ref: ColumnRef, limit: number): Promise<DistinctValue[]> {
    const sql = buildDistinctQuery(this.dialect, ref, limit);
    const rows = await this.run('distinct', sql, [], distinctRowSchema, formatColumnRef(ref));
    return rows.map(r => ({ value: normalizeValue(r.value), freq: r.freq }));
  }

  private async run<S extends z.ZodTypeAny>(
    label: string,
    sql: string,
    params: unknown[],
    schema: S,
    target?: string,
  ): Promise<z.infer<S>[]> {
    const startTime = Date.now();
    let rows: Record<string, unknown>[];
    try {
      rows = await this.client.query(sql, params);
    } catch (err) {
      throw mapSqlError(this.dialect, err, target, label);
    }

    this.logger.logQuery(
      createQueryReceipt({
        label: target ? `${label} ${target}` : label,
        dialect: this.dialect,
        startTime,
        rowCount: rows.length,
      }),
      sql,
    );

    return parseRows(schema, rows, label, this.dialect);
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** `enum('a','it''s')` → ['a', "it's"] */
export function parseEnumLabels(columnType: string): string[] {
  const body = /^enum\((.*)\)$/is.exec(columnType.trim())?.[1];
  if (body === undefined) return [];

  const labels: string[] = [];
  for (const match of body.matchAll(/'((?:[^']|'')*)'/g)) {
    labels.push((match[1] ?? '').replace(/''/g, "'"));
  }
  return labels;
}
