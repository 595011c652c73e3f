/**
 * sqlscope MCP Tool Definitions
 *
 * Every tool includes a zod input schema with descriptions, so an AI that
 * connects gets self-documenting tools. Arguments are validated against the
 * schema before dispatch.
 */

import { z } from 'zod';
import { SqlScopeError } from '../src/errors.js';
import { formatReport } from '../src/report.js';
import { renderScript } from '../src/script.js';
import type { SqlScope } from '../src/sqlscope.js';

const schemaArg = z.string().min(1).optional()
  .describe('Postgres schema or MySQL database. Defaults to the configured schema, then the connection\'s current one.');
const columnsArg = z.union([z.array(z.string()), z.string()])
  .describe('Columns as "table.column" or "schema.table.column". Example: ["orders.status", "users.role"]');
const limitArg = z.number().int().nonnegative().optional()
  .describe('Maximum distinct values per column, most frequent first. 0 = no limit. Default 1000.');

export const toolDefinitions = {
  sqlscope_overview: {
    description: 'List base tables, columns (type, nullability, default), primary keys, foreign keys and enums of one schema. Call this before writing any query.',
    inputSchema: z.object({
      schema: schemaArg,
    }),
  },
  sqlscope_distincts: {
    description: 'Count the distinct values of each given column. Use it to learn the real vocabulary of status/type/role columns before mapping them.',
    inputSchema: z.object({
      columns: columnsArg,
      limit: limitArg,
      schema: schemaArg,
    }),
  },
  sqlscope_extract: {
    description: 'Schema overview plus distinct values in one call. format "markdown" returns a document ready to keep as context.',
    inputSchema: z.object({
      columns: columnsArg.optional(),
      limit: limitArg,
      schema: schemaArg,
      format: z.enum(['json', 'markdown', 'text']).default('json').describe('Result shape'),
    }),
  },
  sqlscope_script: {
    description: 'Render a copy-paste SQL script that extracts the same information. Needs no database connection.',
    inputSchema: z.object({
      dialect: z.enum(['pg', 'mysql']).describe('Target database'),
      variant: z.enum(['client', 'gui']).default('client')
        .describe('client: psql / mysql CLI features; gui: plain SQL for GUI tools'),
      schema: schemaArg,
      columns: columnsArg.optional(),
      limit: limitArg,
    }),
  },
  sqlscope_status: {
    description: 'Connection status: dialect, redacted URI, database, uptime.',
    inputSchema: z.object({}),
  },
} as const;

export type ToolName = keyof typeof toolDefinitions;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolDefinitions, name);
}

/**
 * Validate `args` for `toolName` and run it. `getScope` is only called by
 * tools that need a connection.
 */
export async function runTool(
  getScope: () => Promise<SqlScope>,
  toolName: string,
  args: unknown,
): Promise<unknown> {
  if (!isToolName(toolName)) {
    throw new Error(`Unknown tool: ${toolName}`);
  }

  switch (toolName) {
    case 'sqlscope_overview': {
      const input = parseArgs(toolName, toolDefinitions.sqlscope_overview.inputSchema, args);
      return (await getScope()).overview(input.schema);
    }

    case 'sqlscope_distincts': {
      const input = parseArgs(toolName, toolDefinitions.sqlscope_distincts.inputSchema, args);
      return (await getScope()).sampleDistincts(input.columns, { limit: input.limit, schema: input.schema });
    }

    case 'sqlscope_extract': {
      const input = parseArgs(toolName, toolDefinitions.sqlscope_extract.inputSchema, args);
      const extraction = await (await getScope()).extract({
        columns: input.columns,
        limit: input.limit,
        schema: input.schema,
      });
      return input.format === 'json' ? extraction : formatReport(extraction, input.format);
    }

    case 'sqlscope_script': {
      const input = parseArgs(toolName, toolDefinitions.sqlscope_script.inputSchema, args);
      return renderScript({
        dialect: input.dialect === 'pg' ? 'pg' : 'mysql2',
        variant: input.variant,
        schema: input.schema,
        distinctColumns: input.columns,
        distinctLimit: input.limit,
      });
    }

    case 'sqlscope_status':
      parseArgs(toolName, toolDefinitions.sqlscope_status.inputSchema, args);
      return (await getScope()).status();
  }
}

function parseArgs<S extends z.ZodTypeAny>(
  toolName: ToolName,
  schema: S,
  args: unknown,
): z.infer<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SqlScopeError({
      code: 'CONFIG_INVALID',
      message: `Invalid arguments for ${toolName}: ${issue ? `${issue.path.join('.') || 'args'}: ${issue.message}` : 'invalid input'}.`,
      fix: `Match the tool's input schema: ${toolDefinitions[toolName].description}`,
      operation: toolName,
    });
  }
  return result.data;
}
