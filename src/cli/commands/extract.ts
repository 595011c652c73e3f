/**
 * extract command - Overview plus distinct values in one report.
 *
 * With --format markdown the output is ready to paste into an AI chat as
 * schema context.
 */

import { Command } from 'commander';
import { formatReport } from '../../report.js';
import { addConnectionOptions, openScope, parseLimit, reportError, writeOutput } from '../shared.js';
import type { ConnectionFlags } from '../shared.js';

interface ExtractFlags extends ConnectionFlags {
  columns?: string;
}

export function createExtractCommand(): Command {
  return addConnectionOptions(
    new Command('extract')
      .description('Schema overview plus distinct values for selected columns')
      .option('--columns <list>', 'Comma-separated columns to sample (default: distinctColumns from config)')
      .option('-l, --limit <n>', 'Rows per column (0 = no limit; default 1000)', parseLimit),
  ).action(async (flags: ExtractFlags) => {
    try {
      const scope = await openScope(flags);
      try {
        const extraction = await scope.extract({
          schema: flags.schema,
          columns: flags.columns,
          limit: flags.limit,
        });
        await writeOutput(formatReport(extraction, flags.format), flags.output);
      } finally {
        await scope.close();
      }
    } catch (err) {
      reportError(err);
    }
  });
}
