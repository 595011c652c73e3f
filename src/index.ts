/**
 * sqlscope — Public API Entry Point
 *
 * Schema overview and distinct-value sampling for PostgreSQL and MySQL/MariaDB.
 */

// Main class
export { SqlScope } from './sqlscope.js';
export type { CreateOptions } from './sqlscope.js';

// Errors & events
export { SqlScopeError } from './errors.js';
export { SqlScopeEventEmitter } from './events.js';

// Configuration
export { loadConfig, resolveConfig } from './config.js';
export type { LoadConfigOptions, ResolvedConfig } from './config.js';

// Rendering
export { formatReport, formatDistinctReport, formatText, formatMarkdown, formatJson } from './report.js';
export type { ReportFormat } from './report.js';
export { renderScript } from './script.js';

// Building blocks
export { parseColumnList, parseColumnRef, quoteIdentifier } from './identifiers.js';
export type { SqlClient } from './core/db/sql.js';

// Types
export type {
  ColumnInfo,
  ColumnRef,
  ConnectionStatus,
  DistinctSample,
  DistinctValue,
  EnumType,
  ExtractOptions,
  Extraction,
  ForeignKey,
  PoolPreset,
  PrimaryKeyColumn,
  QueryReceipt,
  SampleOptions,
  ScalarValue,
  SchemaOverview,
  ScriptOptions,
  ScriptVariant,
  SqlDialect,
  SqlScopeConfig,
  SqlScopeErrorCode,
  SqlScopeEvents,
  SqlScopeListener,
  TableInfo,
} from './types.js';
