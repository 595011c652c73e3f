/**
 * overview command - List base tables, columns, keys and enums of one schema.
 */

import { Command } from 'commander';
import { formatReport } from '../../report.js';
import { addConnectionOptions, openScope, reportError, writeOutput } from '../shared.js';
import type { ConnectionFlags } from '../shared.js';

export function createOverviewCommand(): Command {
  return addConnectionOptions(
    new Command('overview').description('Show tables, columns, primary keys, foreign keys and enums'),
  ).action(async (flags: ConnectionFlags) => {
    try {
      const scope = await openScope(flags);
      try {
        const overview = await scope.overview(flags.schema);
        await writeOutput(formatReport({ overview, distincts: [] }, flags.format), flags.output);
      } finally {
        await scope.close();
      }
    } catch (err) {
      reportError(err);
    }
  });
}
