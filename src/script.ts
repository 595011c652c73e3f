/**
 * sqlscope Script Rendering — copy-paste SQL for use without Node
 *
 * Four variants of the same extraction:
 * - pg client:    psql meta-commands (\set, \echo, :'schema_name')
 * - pg gui:       plain SQL with comment headers for pgAdmin, DBeaver, DataGrip
 * - mysql client: session variable @db_name, header rows via SELECT
 * - mysql gui:    plain SQL with a literal schema and comment headers
 *
 * Distinct columns are known when the script is rendered, so each gets its
 * own static statement with quoted identifiers. No dynamic SQL is emitted.
 */

import { SqlScopeError } from './errors.js';
import { DEFAULT_DISTINCT_LIMIT } from './config.js';
import { formatColumnRef, parseColumnList, parseColumnRef, quoteLiteral } from './identifiers.js';
import { buildDistinctQuery, buildOverviewQueries } from './queries.js';
import type { ColumnRef, ScriptOptions, SqlDialect, ScriptVariant } from './types.js';

const NO_COLUMNS = 'No columns configured for distinct sampling.';

interface Section {
  title: string;
  sql: string;
}

export function renderScript(options: ScriptOptions): string {
  const limit = options.distinctLimit ?? DEFAULT_DISTINCT_LIMIT;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new SqlScopeError({
      code: 'CONFIG_INVALID',
      message: `Invalid distinct limit ${limit}.`,
      fix: `Use a whole number of rows per column, or 0 for no limit.`,
      dialect: options.dialect,
    });
  }

  const refSchema = options.schema ?? (options.dialect === 'pg' ? 'public' : '');
  const refs = parseColumnList(options.distinctColumns)
    .map(entry => parseColumnRef(entry, refSchema));

  const ctx: RenderContext = {
    dialect: options.dialect,
    variant: options.variant,
    schema: options.schema,
    refs,
    limit,
  };

  return options.dialect === 'pg' ? renderPg(ctx) : renderMysql(ctx);
}

interface RenderContext {
  dialect: SqlDialect;
  variant: ScriptVariant;
  schema: string | undefined;
  refs: ColumnRef[];
  limit: number;
}

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

function renderPg(ctx: RenderContext): string {
  const schema = ctx.schema ?? 'public';
  const client = ctx.variant === 'client';
  const q = buildOverviewQueries('pg', client ? ":'schema_name'" : quoteLiteral(schema, 'pg'));
  const out: string[] = [];

  if (client) {
    out.push(
      '-- PostgreSQL: Extract DB structure (tables, columns, types, PK/FK, enums) and distinct values for selected columns',
      '-- Run with: psql "<connection uri>" -f <this file>',
      `\\set schema_name ${quoteLiteral(schema, 'pg')}`,
      '',
      psqlEcho('=== SCHEMA OVERVIEW ==='),
      '',
    );
    const sections: Section[] = [
      { title: 'TABLES', sql: q.tables },
      { title: 'COLUMNS (name, type, nullable, default)', sql: q.columns },
      { title: 'PRIMARY KEYS', sql: q.primaryKeys },
      { title: 'FOREIGN KEYS', sql: q.foreignKeys },
      { title: 'ENUM TYPES (if any)', sql: q.enums },
    ];
    for (const section of sections) {
      out.push(psqlEcho('---'), psqlEcho(section.title), '', `${section.sql};`, '');
    }

    out.push(psqlEcho('=== DISTINCT VALUES FOR SELECTED COLUMNS ==='));
    if (ctx.refs.length === 0) {
      out.push(psqlEcho(NO_COLUMNS));
    }
    for (const ref of ctx.refs) {
      out.push(psqlEcho(`--- DISTINCTS: ${formatColumnRef(ref)} ---`), `${buildDistinctQuery('pg', ref, ctx.limit)};`);
    }
    return out.join('\n') + '\n';
  }

  out.push(
    '-- PostgreSQL: Copy-paste friendly schema overview (no psql meta-commands)',
    '-- Run the whole file, or each section separately, in pgAdmin, DBeaver, DataGrip or similar.',
    `-- Targets schema ${quoteLiteral(schema, 'pg')}.`,
    '',
  );
  const sections: Section[] = [
    { title: 'TABLES (BASE TABLES)', sql: q.tables },
    { title: 'COLUMNS (name, type, nullable, default)', sql: q.columns },
    { title: 'PRIMARY KEYS', sql: q.primaryKeys },
    { title: 'FOREIGN KEYS', sql: q.foreignKeys },
    { title: 'ENUM TYPES (if any)', sql: q.enums },
    ...distinctSections(ctx, ref => formatColumnRef(ref)),
  ];
  out.push(...sections.map(s => `${commentHeader(s.title)}\n${s.sql};\n`));
  return out.join('\n');
}

function psqlEcho(text: string): string {
  return `\\echo ${quoteLiteral(text, 'pg')}`;
}

// ─── MySQL / MariaDB ─────────────────────────────────────────────────────────

function renderMysql(ctx: RenderContext): string {
  const client = ctx.variant === 'client';
  const schemaLiteral = ctx.schema !== undefined ? quoteLiteral(ctx.schema, 'mysql2') : 'DATABASE()';
  const q = buildOverviewQueries('mysql2', client ? '@db_name' : schemaLiteral);
  const label = (ref: ColumnRef): string => (ref.schema ? formatColumnRef(ref) : `${ref.table}.${ref.column}`);
  const out: string[] = [];

  if (client) {
    out.push(
      '-- MySQL/MariaDB: Extract DB structure (tables, columns, types, PK/FK, enum columns) and distinct values for selected columns',
      '-- Run with: mysql -h <host> -u <user> -p <database> < <this file>',
      `SET @db_name = ${schemaLiteral};`,
      '',
      `SELECT ${quoteLiteral('=== SCHEMA OVERVIEW ===', 'mysql2')} AS header;`,
      '',
      `${q.tables};`,
      '',
    );
    const sections: Section[] = [
      { title: 'COLUMNS (name, type, nullable, default)', sql: q.columns },
      { title: 'PRIMARY KEYS', sql: q.primaryKeys },
      { title: 'FOREIGN KEYS', sql: q.foreignKeys },
      { title: 'ENUM COLUMNS (if any)', sql: q.enums },
    ];
    for (const section of sections) {
      out.push(`SELECT '---' AS sep, ${quoteLiteral(section.title, 'mysql2')} AS header;`, '', `${section.sql};`, '');
    }

    out.push(`SELECT ${quoteLiteral('=== DISTINCT VALUES FOR SELECTED COLUMNS ===', 'mysql2')} AS header;`);
    if (ctx.refs.length === 0) {
      out.push(`SELECT ${quoteLiteral(NO_COLUMNS, 'mysql2')} AS notice;`);
    }
    for (const ref of ctx.refs) {
      out.push(
        `SELECT ${quoteLiteral(`--- DISTINCTS: ${label(ref)} ---`, 'mysql2')} AS section;`,
        `${buildDistinctQuery('mysql2', ref, ctx.limit)};`,
      );
    }
    return out.join('\n') + '\n';
  }

  out.push(
    '-- MySQL/MariaDB: Copy-paste friendly schema overview (no session variables)',
    '-- Run the whole file, or each section separately, in MySQL Workbench, DBeaver, DataGrip or similar.',
    `-- Targets ${ctx.schema !== undefined ? `database ${schemaLiteral}` : 'the current database'}.`,
    '',
  );
  const sections: Section[] = [
    { title: 'TABLES (BASE TABLES)', sql: q.tables },
    { title: 'COLUMNS (name, type, nullable, default)', sql: q.columns },
    { title: 'PRIMARY KEYS', sql: q.primaryKeys },
    { title: 'FOREIGN KEYS', sql: q.foreignKeys },
    { title: 'ENUM COLUMNS (if any)', sql: q.enums },
    ...distinctSections(ctx, label),
  ];
  out.push(...sections.map(s => `${commentHeader(s.title)}\n${s.sql};\n`));
  return out.join('\n');
}

// ─── Shared ──────────────────────────────────────────────────────────────────

function distinctSections(ctx: RenderContext, label: (ref: ColumnRef) => string): Section[] {
  return ctx.refs.map(ref => ({
    title: `DISTINCTS: ${label(ref)}`,
    sql: buildDistinctQuery(ctx.dialect, ref, ctx.limit),
  }));
}

function commentHeader(title: string): string {
  return `/* === ${title.replace(/\*\//g, '* /')} === */`;
}
