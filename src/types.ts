/**
 * sqlscope — Shared types and interfaces
 *
 * Imports nothing, so any module may depend on it.
 */

// ─── Dialect & Driver ────────────────────────────────────────────────────────

export type SqlDialect = 'pg' | 'mysql2';
export type ScriptVariant = 'client' | 'gui';
export type PoolPreset = 'high' | 'standard' | 'low';

// ─── Schema Overview ─────────────────────────────────────────────────────────

export interface TableInfo {
  schema: string;
  name: string;
}

export interface ColumnInfo {
  schema: string;
  table: string;
  name: string;
  /** Display type: pg data_type (udt_name for enums/domains), mysql COLUMN_TYPE. */
  type: string;
  nullable: boolean;
  default: string | null;
  position: number;
}

export interface PrimaryKeyColumn {
  schema: string;
  table: string;
  constraint: string;
  column: string;
  position: number;
}

export interface ForeignKey {
  schema: string;
  table: string;
  column: string;
  foreignSchema: string;
  foreignTable: string;
  foreignColumn: string;
  constraint: string;
}

export interface EnumType {
  schema: string;
  /** pg type name, or `table.column` for mysql inline enums. */
  name: string;
  values: string[];
}

export interface SchemaOverview {
  dialect: SqlDialect;
  schema: string;
  tables: TableInfo[];
  columns: ColumnInfo[];
  primaryKeys: PrimaryKeyColumn[];
  foreignKeys: ForeignKey[];
  enums: EnumType[];
}

// ─── Distinct Sampling ───────────────────────────────────────────────────────

export interface ColumnRef {
  schema: string;
  table: string;
  column: string;
}

export type ScalarValue = string | number | boolean | null;

export interface DistinctValue {
  value: ScalarValue;
  freq: number;
}

export interface DistinctSample {
  ref: ColumnRef;
  /** `schema.table.column` */
  label: string;
  /** 0 = unlimited */
  limit: number;
  values: DistinctValue[];
}

export interface Extraction {
  overview: SchemaOverview;
  distincts: DistinctSample[];
}

export interface SampleOptions {
  limit?: number;
  schema?: string;
}

export interface ExtractOptions {
  schema?: string;
  columns?: string[] | string;
  limit?: number;
}

// ─── Script Rendering ────────────────────────────────────────────────────────

export interface ScriptOptions {
  dialect: SqlDialect;
  variant: ScriptVariant;
  schema?: string;
  distinctColumns?: string[] | string;
  distinctLimit?: number;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface SqlScopeConfig {
  uri: string;
  schema?: string;
  label?: string;
  pool?: PoolPreset;
  statementTimeoutMs?: number;
  distinctColumns?: string[];
  distinctLimit?: number;
  guardrails?: boolean;
  logging?: boolean | 'verbose';
  slowQueryMs?: number;
}

// ─── Query Receipt ───────────────────────────────────────────────────────────

export interface QueryReceipt {
  label: string;
  dialect: SqlDialect;
  rowCount: number;
  duration: number;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type SqlScopeErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'POOL_EXHAUSTED'
  | 'SCHEMA_NOT_FOUND'
  | 'TABLE_NOT_FOUND'
  | 'COLUMN_NOT_FOUND'
  | 'INVALID_COLUMN_REF'
  | 'CONFIG_INVALID'
  | 'UNSUPPORTED_DIALECT'
  | 'GUARDRAIL_BLOCKED'
  | 'QUERY_ERROR'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface SqlScopeEvents {
  connected: { dialect: SqlDialect; dbName: string; label: string };
  closed: { dialect: SqlDialect; label: string; uptimeMs: number };
  query: { label: string; durationMs: number; rowCount: number; sql?: string; receipt: QueryReceipt };
  'slow-query': { label: string; durationMs: number; threshold: number };
  error: { code: SqlScopeErrorCode; message: string; fix: string; dialect: SqlDialect | null };
  'guardrail-blocked': { target: string; operation: string; reason: string };
}

export type SqlScopeListener<E extends keyof SqlScopeEvents> = (payload: SqlScopeEvents[E]) => void;

// ─── Connection Status ───────────────────────────────────────────────────────

export interface ConnectionStatus {
  state: 'connected' | 'closed';
  dialect: SqlDialect;
  uri: string;
  dbName: string;
  label: string;
  uptimeMs: number;
}
