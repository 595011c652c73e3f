/**
 * sqlscope Introspection Adapter Interface
 *
 * The SqlScope facade delegates every catalog read and sample to an adapter.
 * Each list method reads one schema; ordering is the database's, as the
 * underlying queries specify it.
 */

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

export interface IntrospectionAdapter {
  readonly dialect: SqlDialect;

  // ─── Lifecycle ────────────────────────────────────────────────────
  close(): Promise<void>;

  // ─── Catalog ──────────────────────────────────────────────────────
  currentSchema(): Promise<string | null>;
  listTables(schema: string): Promise<TableInfo[]>;
  listColumns(schema: string): Promise<ColumnInfo[]>;
  listPrimaryKeys(schema: string): Promise<PrimaryKeyColumn[]>;
  listForeignKeys(schema: string): Promise<ForeignKey[]>;
  listEnums(schema: string): Promise<EnumType[]>;

  // ─── Sampling ─────────────────────────────────────────────────────
  sampleDistinct(ref: ColumnRef, limit: number): Promise<DistinctValue[]>;
}
