/**
 * sqlscope Reports — render an Extraction for people and AI assistants
 *
 * - text: the sectioned console layout of the copy-paste scripts
 * - markdown: one table per database table, meant to be pasted into a chat
 *   as schema context
 * - json: the Extraction itself
 */

import type { ColumnInfo, DistinctSample, Extraction, ScalarValue, SchemaOverview } from './types.js';

export type ReportFormat = 'text' | 'markdown' | 'json';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'markdown', 'json'];

/** Distinct samples on their own, for `sqlscope distincts`. */
export function formatDistinctReport(distincts: DistinctSample[], format: ReportFormat): string {
  switch (format) {
    case 'text':
      return renderDistinctText(distincts).join('\n') + '\n';
    case 'markdown':
      return distincts.flatMap(renderDistinctMarkdown).join('\n').trimEnd() + '\n';
    case 'json':
      return JSON.stringify(distincts, null, 2) + '\n';
  }
}

export function formatReport(extraction: Extraction, format: ReportFormat): string {
  switch (format) {
    case 'text':
      return formatText(extraction);
    case 'markdown':
      return formatMarkdown(extraction);
    case 'json':
      return formatJson(extraction);
  }
}

// ─── Text ────────────────────────────────────────────────────────────────────

export function formatText(extraction: Extraction): string {
  const { overview, distincts } = extraction;
  const lines: string[] = [];

  lines.push(`=== SCHEMA OVERVIEW (${overview.dialect === 'pg' ? 'postgres' : 'mysql'}: ${overview.schema}) ===`, '');

  lines.push('--- TABLES ---');
  lines.push(...renderGrid(
    ['table_schema', 'table_name'],
    overview.tables.map(t => [t.schema, t.name]),
  ), '');

  lines.push('--- COLUMNS (name, type, nullable, default) ---');
  lines.push(...renderGrid(
    ['table_name', 'column_name', 'type', 'nullable', 'default'],
    overview.columns.map(c => [c.table, c.name, c.type, c.nullable ? 'YES' : 'NO', c.default ?? '']),
  ), '');

  lines.push('--- PRIMARY KEYS ---');
  lines.push(...renderGrid(
    ['table_name', 'constraint_name', 'column_name'],
    overview.primaryKeys.map(pk => [pk.table, pk.constraint, pk.column]),
  ), '');

  lines.push('--- FOREIGN KEYS ---');
  lines.push(...renderGrid(
    ['table_name', 'column_name', 'references', 'constraint_name'],
    overview.foreignKeys.map(fk => [
      fk.table,
      fk.column,
      `${fk.foreignSchema}.${fk.foreignTable}.${fk.foreignColumn}`,
      fk.constraint,
    ]),
  ), '');

  if (overview.enums.length > 0) {
    lines.push('--- ENUM TYPES ---');
    lines.push(...renderGrid(
      ['enum_name', 'values'],
      overview.enums.map(e => [e.name, e.values.join(', ')]),
    ), '');
  }

  lines.push(...renderDistinctText(distincts));
  return lines.join('\n') + '\n';
}

function renderDistinctText(distincts: DistinctSample[]): string[] {
  const lines = ['=== DISTINCT VALUES FOR SELECTED COLUMNS ==='];
  if (distincts.length === 0) {
    lines.push('No columns configured for distinct sampling.');
  }
  for (const sample of distincts) {
    lines.push('', `--- DISTINCTS: ${sample.label} ---`);
    lines.push(...renderGrid(
      ['value', 'freq'],
      sample.values.map(v => [displayValue(v.value), String(v.freq)]),
    ));
  }
  return lines;
}

/**
 * psql-style aligned grid: header, dashed rule, rows, then a row count.
 */
export function renderGrid(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)),
  );
  const line = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ').trimEnd();

  return [
    line(headers),
    widths.map(w => '-'.repeat(w)).join('-+-'),
    ...rows.map(line),
    `(${rows.length} ${rows.length === 1 ? 'row' : 'rows'})`,
  ];
}

function displayValue(value: ScalarValue): string {
  return value === null ? 'NULL' : String(value);
}

// ─── Markdown ────────────────────────────────────────────────────────────────

export function formatMarkdown(extraction: Extraction): string {
  const { overview, distincts } = extraction;
  const dialectName = overview.dialect === 'pg' ? 'PostgreSQL' : 'MySQL';
  const out: string[] = [];

  out.push(`# Schema \`${overview.schema}\` (${dialectName})`, '');
  out.push(
    `${plural(overview.tables.length, 'table')}, ${plural(overview.columns.length, 'column')}, `
    + `${plural(overview.foreignKeys.length, 'foreign key')}.`,
    '',
  );

  for (const table of overview.tables) {
    const columns = overview.columns.filter(c => c.table === table.name);
    out.push(`## ${table.name}`, '');
    out.push('| Column | Type | Nullable | Default | Key |');
    out.push('| --- | --- | --- | --- | --- |');
    for (const column of columns) {
      out.push(`| ${cell(column.name)} | ${cell(column.type)} | ${column.nullable ? 'YES' : 'NO'} | `
        + `${cell(column.default ?? '')} | ${cell(describeKeys(overview, column))} |`);
    }
    out.push('');
  }

  if (overview.enums.length > 0) {
    out.push('## Enums', '');
    for (const e of overview.enums) {
      out.push(`- \`${e.name}\`: ${e.values.join(', ')}`);
    }
    out.push('');
  }

  if (distincts.length > 0) {
    out.push('## Distinct values', '');
    for (const sample of distincts) {
      out.push(...renderDistinctMarkdown(sample));
    }
  }

  return out.join('\n').trimEnd() + '\n';
}

function renderDistinctMarkdown(sample: DistinctSample): string[] {
  const limit = sample.limit > 0 ? `top ${sample.limit}` : 'all values';
  return [
    `### ${sample.label} (${limit})`,
    '',
    '| Value | Count |',
    '| --- | --- |',
    ...sample.values.map(v => `| ${cell(displayValue(v.value))} | ${v.freq} |`),
    '',
  ];
}

function describeKeys(overview: SchemaOverview, column: ColumnInfo): string {
  const keys: string[] = [];
  const isPk = overview.primaryKeys.some(pk => pk.table === column.table && pk.column === column.name);
  if (isPk) keys.push('PK');

  for (const fk of overview.foreignKeys) {
    if (fk.table === column.table && fk.column === column.name) {
      keys.push(`FK → ${fk.foreignSchema}.${fk.foreignTable}.${fk.foreignColumn}`);
    }
  }
  return keys.join(', ');
}

function cell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

// ─── JSON ────────────────────────────────────────────────────────────────────

export function formatJson(extraction: Extraction): string {
  return JSON.stringify(extraction, null, 2) + '\n';
}
