/**
 * sqlscope command-line program.
 */

import { Command } from 'commander';
import { createOverviewCommand } from './commands/overview.js';
import { createDistinctsCommand } from './commands/distincts.js';
import { createExtractCommand } from './commands/extract.js';
import { createScriptCommand } from './commands/script.js';

export const VERSION = '0.1.0';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('sqlscope')
    .description('Schema overview and distinct-value sampling for PostgreSQL and MySQL')
    .version(VERSION);

  [createOverviewCommand, createDistinctsCommand, createExtractCommand, createScriptCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
