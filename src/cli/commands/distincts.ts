/**
 * distincts command - Value frequencies for the given columns.
 */

import { Command } from 'commander';
import { formatDistinctReport } from '../../report.js';
import { addConnectionOptions, openScope, parseLimit, reportError, writeOutput } from '../shared.js';
import type { ConnectionFlags } from '../shared.js';

export function createDistinctsCommand(): Command {
  return addConnectionOptions(
    new Command('distincts')
      .description('Count distinct values of each column, most frequent first')
      .argument('<columns...>', 'Columns as table.column or schema.table.column (comma lists accepted)')
      .option('-l, --limit <n>', 'Rows per column (0 = no limit; default 1000)', parseLimit),
  ).action(async (columns: string[], flags: ConnectionFlags) => {
    try {
      const scope = await openScope(flags);
      try {
        const samples = await scope.sampleDistincts(columns.join(','), {
          limit: flags.limit,
          schema: flags.schema,
        });
        await writeOutput(formatDistinctReport(samples, flags.format), flags.output);
      } finally {
        await scope.close();
      }
    } catch (err) {
      reportError(err);
    }
  });
}
