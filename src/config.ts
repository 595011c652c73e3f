/**
 * sqlscope Configuration — defaults < sqlscope.yaml < SQLSCOPE_* env < overrides
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { SqlScopeError } from './errors.js';
import { parseColumnList } from './identifiers.js';
import type { SqlScopeConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'sqlscope.yaml';
export const DEFAULT_DISTINCT_LIMIT = 1000;

const columnList = z.preprocess(
  v => (typeof v === 'string' ? parseColumnList(v) : v),
  z.array(z.string()),
);

export const configSchema = z.object({
  uri: z.string({ required_error: 'a connection URI is required' }).min(1, 'a connection URI is required'),
  schema: z.string().min(1).optional(),
  label: z.string().default('sqlscope'),
  pool: z.enum(['low', 'standard', 'high']).default('low'),
  statementTimeoutMs: z.coerce.number().int().positive().optional(),
  distinctColumns: columnList.default([]),
  distinctLimit: z.coerce.number().int().nonnegative().default(DEFAULT_DISTINCT_LIMIT),
  guardrails: z.boolean().default(true),
  logging: z.union([z.boolean(), z.literal('verbose')]).default(true),
  slowQueryMs: z.coerce.number().int().positive().default(1000),
});

export type ResolvedConfig = z.infer<typeof configSchema>;

const fileSchema = z.record(z.unknown()).nullable();

const ENV_KEYS = {
  SQLSCOPE_URI: 'uri',
  SQLSCOPE_SCHEMA: 'schema',
  SQLSCOPE_DISTINCT_COLUMNS: 'distinctColumns',
  SQLSCOPE_DISTINCT_LIMIT: 'distinctLimit',
} as const;

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit file path; must exist. Without it, sqlscope.yaml is optional. */
  file?: string;
  env?: Record<string, string | undefined>;
  overrides?: Partial<SqlScopeConfig>;
}

/**
 * Validate a programmatic config and fill defaults.
 */
export function resolveConfig(input: unknown): ResolvedConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new SqlScopeError({
      code: 'CONFIG_INVALID',
      message: `Invalid configuration at "${field}": ${issue?.message ?? 'invalid value'}.`,
      fix: field === 'uri'
        ? `Set SQLSCOPE_URI, pass --uri, or add "uri:" to ${DEFAULT_CONFIG_FILE}.`
        : `Correct "${field}" in ${DEFAULT_CONFIG_FILE}, the SQLSCOPE_* environment, or the command-line flags.`,
    });
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const fileValues = await readConfigFile(cwd, options.file);
  const envValues = readEnv(options.env ?? process.env);
  const overrides = dropUndefined(options.overrides ?? {});

  return resolveConfig({ ...fileValues, ...envValues, ...overrides });
}

async function readConfigFile(cwd: string, file: string | undefined): Promise<Record<string, unknown>> {
  const fullPath = path.resolve(cwd, file ?? DEFAULT_CONFIG_FILE);

  let content: string;
  try {
    content = await readFile(fullPath, 'utf-8');
  } catch (err) {
    if (file === undefined && isNotFound(err)) return {};
    throw new SqlScopeError({
      code: 'CONFIG_INVALID',
      message: `Cannot read config file ${fullPath}.`,
      fix: `Check the --config path, or omit it to use ${DEFAULT_CONFIG_FILE} when present.`,
      originalError: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new SqlScopeError({
      code: 'CONFIG_INVALID',
      message: `Config file ${fullPath} is not valid YAML.`,
      fix: `Fix the YAML syntax: ${err instanceof Error ? err.message : String(err)}`,
      originalError: err,
    });
  }

  const result = fileSchema.safeParse(parsed ?? null);
  if (!result.success) {
    throw new SqlScopeError({
      code: 'CONFIG_INVALID',
      message: `Config file ${fullPath} must contain a mapping of options.`,
      fix: `Write options as "key: value" lines, e.g. "uri: postgres://localhost/app".`,
    });
  }
  return result.data ?? {};
}

function readEnv(env: Record<string, string | undefined>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      values[configKey] = value;
    }
  }
  return values;
}

function dropUndefined(values: Partial<SqlScopeConfig>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
