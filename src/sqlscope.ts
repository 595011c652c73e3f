/**
 * SqlScope — Schema overview and distinct sampling for PostgreSQL and MySQL
 *
 * Auto-detects the dialect from the URI. Every call flows through:
 *
 *   Caller (CLI / MCP tool / code) → SqlScope (router)
 *     → identifiers (parse column refs)
 *     → guardrails (verify refs against the overview)
 *     → adapter (catalog queries, distinct queries)
 *     → logger (query / slow-query events)
 *     → return to caller
 *
 * Statements run one after another; the first failure propagates as a
 * SqlScopeError.
 */

import type {
  ColumnRef,
  ConnectionStatus,
  DistinctSample,
  ExtractOptions,
  Extraction,
  SampleOptions,
  SchemaOverview,
  SqlDialect,
  SqlScopeConfig,
  SqlScopeEvents,
  SqlScopeListener,
} from './types.js';
import { SqlScopeError } from './errors.js';
import { SqlScopeEventEmitter } from './events.js';
import { SqlScopeLogger } from './logger.js';
import { checkDistinctTargets } from './guardrails.js';
import { formatColumnRef, parseColumnList, parseColumnRef } from './identifiers.js';
import { resolveConfig } from './config.js';
import type { ResolvedConfig } from './config.js';
import { connectSql, detectDialect, extractDbName, redactUri } from './core/db/sql.js';
import type { SqlClient } from './core/db/sql.js';
import type { IntrospectionAdapter } from './adapters/adapter.js';
import { SqlAdapter } from './adapters/sql-adapter.js';

export interface CreateOptions {
  /** Use this client instead of opening a pool from the URI. */
  client?: SqlClient;
  /** Subscribe before connecting to receive the `connected` event. */
  emitter?: SqlScopeEventEmitter;
}

export class SqlScope {
  readonly dialect: SqlDialect;

  private adapter: IntrospectionAdapter;
  private emitter: SqlScopeEventEmitter;
  private config: ResolvedConfig;
  private connectedAt: Date | null;

  private constructor(
    config: ResolvedConfig,
    adapter: IntrospectionAdapter,
    emitter: SqlScopeEventEmitter,
  ) {
    this.config = config;
    this.adapter = adapter;
    this.emitter = emitter;
    this.dialect = adapter.dialect;
    this.connectedAt = new Date();
  }

  /**
   * Validate config, connect, and return a ready instance.
   */
  static async create(config: SqlScopeConfig, options: CreateOptions = {}): Promise<SqlScope> {
    const resolved = resolveConfig(config);
    const dialect = detectDialect(resolved.uri);
    const emitter = options.emitter ?? new SqlScopeEventEmitter();
    const logger = new SqlScopeLogger(
      {
        enabled: resolved.logging !== false,
        verbose: resolved.logging === 'verbose',
        slowQueryMs: resolved.slowQueryMs,
      },
      emitter,
    );

    const client = options.client ?? await connectSql(resolved.uri, {
      pool: resolved.pool,
      label: resolved.label,
      statementTimeoutMs: resolved.statementTimeoutMs,
    });

    if (client.dialect !== dialect) {
      throw new SqlScopeError({
        code: 'CONFIG_INVALID',
        message: `The supplied client speaks "${client.dialect}" but the URI is for "${dialect}".`,
        fix: `Pass a URI that matches the client, or omit the client to connect from the URI.`,
        dialect,
      });
    }

    const scope = new SqlScope(resolved, new SqlAdapter(client, logger), emitter);
    emitter.emit('connected', {
      dialect,
      dbName: resolved.schema ?? extractDbName(resolved.uri),
      label: resolved.label,
    });
    return scope;
  }

  on<E extends keyof SqlScopeEvents>(event: E, listener: SqlScopeListener<E>): this {
    this.emitter.on(event, listener);
    return this;
  }

  // ─── Schema Overview ───────────────────────────────────────────────────────

  async overview(schema?: string): Promise<SchemaOverview> {
    return this.guard(async () => {
      const target = await this.resolveSchema(schema);
      return {
        dialect: this.dialect,
        schema: target,
        tables: await this.adapter.listTables(target),
        columns: await this.adapter.listColumns(target),
        primaryKeys: await this.adapter.listPrimaryKeys(target),
        foreignKeys: await this.adapter.listForeignKeys(target),
        enums: await this.adapter.listEnums(target),
      };
    });
  }

  // ─── Distinct Sampling ─────────────────────────────────────────────────────

  /**
   * Sample value frequencies for each column, in the order given. Without
   * `columns`, the configured distinctColumns are used.
   */
  async sampleDistincts(columns?: string[] | string, options: SampleOptions = {}): Promise<DistinctSample[]> {
    return this.guard(async () => {
      const entries = parseColumnList(columns ?? this.config.distinctColumns);
      if (entries.length === 0) return [];

      const limit = this.resolveLimit(options.limit);
      const schema = await this.resolveSchema(options.schema);
      const refs = entries.map(entry => parseColumnRef(entry, schema));
      return this.sampleRefs(refs, limit);
    });
  }

  /**
   * Overview plus distinct samples, with refs verified against the overview
   * before any sampling query runs.
   */
  async extract(options: ExtractOptions = {}): Promise<Extraction> {
    const overview = await this.overview(options.schema);

    const distincts = await this.guard(async () => {
      const entries = parseColumnList(options.columns ?? this.config.distinctColumns);
      const limit = this.resolveLimit(options.limit);
      const refs = entries.map(entry => parseColumnRef(entry, overview.schema));

      checkDistinctTargets({ enabled: this.config.guardrails, emitter: this.emitter }, refs, overview);
      return this.sampleRefs(refs, limit);
    });

    return { overview, distincts };
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  status(): ConnectionStatus {
    return {
      state: this.connectedAt ? 'connected' : 'closed',
      dialect: this.dialect,
      uri: redactUri(this.config.uri),
      dbName: this.config.schema ?? extractDbName(this.config.uri),
      label: this.config.label,
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
    };
  }

  async close(): Promise<void> {
    if (!this.connectedAt) return;
    const uptimeMs = Date.now() - this.connectedAt.getTime();
    this.connectedAt = null;
    await this.adapter.close();
    this.emitter.emit('closed', { dialect: this.dialect, label: this.config.label, uptimeMs });
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async sampleRefs(refs: ColumnRef[], limit: number): Promise<DistinctSample[]> {
    const samples: DistinctSample[] = [];
    for (const ref of refs) {
      const values = await this.adapter.sampleDistinct(ref, limit);
      samples.push({ ref, label: formatColumnRef(ref), limit, values });
    }
    return samples;
  }

  private async resolveSchema(schema?: string): Promise<string> {
    const explicit = schema ?? this.config.schema;
    if (explicit) return explicit;

    const current = await this.adapter.currentSchema();
    if (current) return current;

    throw new SqlScopeError({
      code: 'SCHEMA_NOT_FOUND',
      message: `No schema given and the connection has no current ${this.dialect === 'pg' ? 'schema' : 'database'}.`,
      fix: this.dialect === 'pg'
        ? `Pass --schema, or set search_path for the connecting role.`
        : `Pass --schema, or put the database in the URI path (mysql://user@host/dbname).`,
      dialect: this.dialect,
      operation: 'resolveSchema',
    });
  }

  private resolveLimit(limit: number | undefined): number {
    const value = limit ?? this.config.distinctLimit;
    if (!Number.isInteger(value) || value < 0) {
      throw new SqlScopeError({
        code: 'CONFIG_INVALID',
        message: `Invalid distinct limit ${value}.`,
        fix: `Use a whole number of rows per column, or 0 for no limit.`,
        dialect: this.dialect,
      });
    }
    return value;
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.connectedAt) {
      throw new SqlScopeError({
        code: 'CONNECTION_FAILED',
        message: `This SqlScope instance is closed.`,
        fix: `Create a new instance with SqlScope.create().`,
        dialect: this.dialect,
      });
    }

    try {
      return await fn();
    } catch (err) {
      if (err instanceof SqlScopeError) {
        this.emitter.reportError(err, this.dialect);
      }
      throw err;
    }
  }
}
