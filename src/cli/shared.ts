/**
 * Shared plumbing for the sqlscope commands: connection flags, event
 * printing, output, and error reporting.
 */

import { writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { SqlScope } from '../sqlscope.js';
import { SqlScopeError } from '../errors.js';
import { SqlScopeEventEmitter } from '../events.js';
import { loadConfig } from '../config.js';
import { REPORT_FORMATS } from '../report.js';
import type { ReportFormat } from '../report.js';

export interface ConnectionFlags {
  uri?: string;
  schema?: string;
  config?: string;
  format: ReportFormat;
  output?: string;
  verbose?: boolean;
  limit?: number;
}

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Must be a whole number (0 = no limit).');
  }
  return limit;
}

/** Connection, schema, output and logging options shared by the live commands. */
export function addConnectionOptions(command: Command): Command {
  return command
    .option('--uri <uri>', 'Connection URI (postgres://, mysql://, mariadb://); defaults to SQLSCOPE_URI')
    .option('-s, --schema <schema>', 'Schema (Postgres) or database (MySQL) to read')
    .option('-c, --config <path>', 'Path to a YAML config file (default: ./sqlscope.yaml when present)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS).default('text'))
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('--verbose', 'Print every statement with its timing to stderr');
}

export async function openScope(flags: ConnectionFlags): Promise<SqlScope> {
  const config = await loadConfig({
    file: flags.config,
    overrides: {
      uri: flags.uri,
      schema: flags.schema,
      distinctLimit: flags.limit,
      logging: flags.verbose ? 'verbose' : undefined,
    },
  });

  const emitter = new SqlScopeEventEmitter();
  attachEventPrinter(emitter, flags.verbose ?? false);
  return SqlScope.create(config, { emitter });
}

export function attachEventPrinter(emitter: SqlScopeEventEmitter, verbose: boolean): void {
  emitter.on('slow-query', e => {
    console.error(chalk.yellow(`[SLOW] ${e.label} took ${e.durationMs}ms (threshold ${e.threshold}ms)`));
  });
  emitter.on('guardrail-blocked', e => {
    console.error(chalk.yellow(`[GUARDRAIL] ${e.target}: ${e.reason}`));
  });

  if (!verbose) return;

  emitter.on('connected', e => {
    console.error(chalk.blue(`[INFO] Connected to ${e.dialect === 'pg' ? 'PostgreSQL' : 'MySQL'} (${e.dbName})`));
  });
  emitter.on('query', e => {
    console.error(chalk.gray(`[QUERY] ${e.label}: ${e.rowCount} rows in ${e.durationMs}ms`));
    if (e.sql) console.error(chalk.gray(e.sql));
  });
}

export async function writeOutput(text: string, output?: string): Promise<void> {
  if (output) {
    await writeFile(output, text, 'utf-8');
    console.error(chalk.green(`Wrote ${output}`));
    return;
  }
  process.stdout.write(text);
}

export function reportError(err: unknown): void {
  if (err instanceof SqlScopeError) {
    console.error(chalk.red(`Error [${err.code}]: ${err.message.replace(` Fix: ${err.fix}`, '')}`));
    console.error(chalk.yellow(`Fix: ${err.fix}`));
  } else {
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  }
  process.exitCode = 1;
}
