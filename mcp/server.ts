#!/usr/bin/env node
/**
 * sqlscope MCP Server
 *
 * The interface for AI assistants. The assistant never holds credentials:
 * the connection comes from SQLSCOPE_URI (or sqlscope.yaml) and is opened
 * on the first tool that needs it.
 */

import { SqlScope } from '../src/sqlscope.js';
import { loadConfig } from '../src/config.js';
import { runTool } from './tools.js';

// Concurrent first calls share one pending connection.
let pending: Promise<SqlScope> | null = null;

function getScope(): Promise<SqlScope> {
  if (!pending) {
    pending = openScope().catch((err: unknown) => {
      pending = null;
      throw err;
    });
  }
  return pending;
}

async function openScope(): Promise<SqlScope> {
  const config = await loadConfig({ overrides: { label: 'MCP' } });
  return SqlScope.create(config);
}

/**
 * Handle an MCP tool call. Returns the result as a JSON-serializable value.
 */
export async function handleToolCall(
  toolName: string,
  args: Record<string, unknown>,
): Promise<unknown> {
  return runTool(getScope, toolName, args);
}

export async function shutdown(): Promise<void> {
  if (!pending) return;
  const current = pending;
  pending = null;
  await (await current).close();
}

// Graceful shutdown
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.once(signal, () => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      },
    );
  });
}
