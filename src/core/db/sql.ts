/**
 * sqlscope SQL Connection Layer
 *
 * Owns the pg / mysql2 pools. Everything above this file talks to a
 * SqlClient and never touches a driver directly.
 */

import pg from 'pg';
import mysql from 'mysql2/promise';
import type { RowDataPacket } from 'mysql2/promise';
import { SqlScopeError, mapSqlError } from '../../errors.js';
import type { PoolPreset, SqlDialect } from '../../types.js';

export interface SqlClient {
  readonly dialect: SqlDialect;
  query(sql: string, params?: unknown[]): Promise<Record<string, unknown>[]>;
  close(): Promise<void>;
}

export interface ConnectOptions {
  pool?: PoolPreset;
  /** Reported to the server: pg application_name, MySQL program_name. */
  label?: string;
  statementTimeoutMs?: number;
}

const POOL_SIZES: Record<PoolPreset, number> = {
  low: 2,
  standard: 5,
  high: 10,
};

export async function connectSql(uri: string, options: ConnectOptions = {}): Promise<SqlClient> {
  const dialect = detectDialect(uri);
  const max = POOL_SIZES[options.pool ?? 'low'];
  const client = dialect === 'pg'
    ? createPgClient(uri, max, options)
    : createMysqlClient(uri, max, options);

  try {
    await client.query('SELECT 1');
  } catch (err) {
    await client.close().catch(() => undefined);
    throw mapSqlError(dialect, err, extractDbName(uri), 'connect');
  }

  return client;
}

function createPgClient(uri: string, max: number, options: ConnectOptions): SqlClient {
  const pool = new pg.Pool({
    connectionString: uri,
    max,
    application_name: options.label ?? 'sqlscope',
    statement_timeout: options.statementTimeoutMs,
  });

  return {
    dialect: 'pg',
    async query(sql, params) {
      const result = await pool.query(sql, params);
      return result.rows;
    },
    async close() {
      await pool.end();
    },
  };
}

function createMysqlClient(uri: string, max: number, options: ConnectOptions): SqlClient {
  // Values come back as stored: zero dates stay '0000-00-00', BIGINTs past 2^53 stay exact.
  const pool = mysql.createPool({
    uri: uri.replace(/^mariadb:\/\//, 'mysql://'),
    connectionLimit: max,
    dateStrings: true,
    supportBigNumbers: true,
    bigNumberStrings: true,
    connectAttributes: { program_name: options.label ?? 'sqlscope' },
  });

  return {
    dialect: 'mysql2',
    async query(sql, params) {
      const [rows] = await pool.query<RowDataPacket[]>(
        { sql, timeout: options.statementTimeoutMs },
        params,
      );
      return rows;
    },
    async close() {
      await pool.end();
    },
  };
}

// ─── URI Helpers ─────────────────────────────────────────────────────────────

export function detectDialect(uri: string): SqlDialect {
  if (uri.startsWith('postgresql://') || uri.startsWith('postgres://')) return 'pg';
  if (uri.startsWith('mysql://') || uri.startsWith('mariadb://')) return 'mysql2';

  throw new SqlScopeError({
    code: 'UNSUPPORTED_DIALECT',
    message: `Unsupported connection URI "${redactUri(uri)}".`,
    fix: `Use a postgres://, postgresql://, mysql:// or mariadb:// URI.`,
  });
}

export function extractDbName(uri: string): string {
  try {
    const url = new URL(uri);
    return decodeURIComponent(url.pathname.replace(/^\//, '')) || 'default';
  } catch {
    return 'default';
  }
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}
