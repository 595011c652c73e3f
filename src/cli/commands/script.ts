/**
 * script command - Render a copy-paste SQL script. No connection needed.
 */

import { Command, Option } from 'commander';
import { renderScript } from '../../script.js';
import { parseLimit, reportError, writeOutput } from '../shared.js';
import type { ScriptVariant, SqlDialect } from '../../types.js';

interface ScriptFlags {
  dialect: 'pg' | 'mysql';
  variant: ScriptVariant;
  schema?: string;
  columns?: string;
  limit?: number;
  output?: string;
}

export function createScriptCommand(): Command {
  return new Command('script')
    .description('Print a SQL script that extracts the same information from a database client')
    .addOption(new Option('-d, --dialect <dialect>', 'Target database').choices(['pg', 'mysql']).makeOptionMandatory())
    .addOption(
      new Option('--variant <variant>', 'client: psql / mysql CLI features; gui: plain SQL for GUI tools')
        .choices(['client', 'gui'])
        .default('client'),
    )
    .option('-s, --schema <schema>', 'Schema or database (default: public / current database)')
    .option('--columns <list>', 'Comma-separated columns to sample for distinct values')
    .option('-l, --limit <n>', 'Rows per column (0 = no limit; default 1000)', parseLimit)
    .option('-o, --output <file>', 'Write the script to a file instead of stdout')
    .action(async (flags: ScriptFlags) => {
      try {
        const dialect: SqlDialect = flags.dialect === 'pg' ? 'pg' : 'mysql2';
        const sql = renderScript({
          dialect,
          variant: flags.variant,
          schema: flags.schema,
          distinctColumns: flags.columns,
          distinctLimit: flags.limit,
        });
        await writeOutput(sql, flags.output);
      } catch (err) {
        reportError(err);
      }
    });
}
