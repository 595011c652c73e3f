/**
 * CLI Tests — command wiring, output and error reporting
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { createCli, VERSION } from '../src/cli/index.js';
import { parseLimit, reportError } from '../src/cli/shared.js';
import { invalidColumnRefError } from '../src/errors.js';

let stdout: string[];
let stderr: string[];

beforeEach(() => {
  stdout = [];
  stderr = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(' '));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  process.exitCode = undefined;
});

async function run(...args: string[]): Promise<void> {
  await createCli().parseAsync(['node', 'sqlscope', ...args]);
}

describe('createCli', () => {
  it('registers the four commands', () => {
    const cli = createCli();
    expect(cli.name()).toBe('sqlscope');
    expect(cli.version()).toBe(VERSION);
    expect(cli.commands.map(c => c.name())).toEqual(['overview', 'distincts', 'extract', 'script']);
  });
});

describe('script command', () => {
  it('prints a psql script', async () => {
    await run('script', '-d', 'pg', '--columns', 'orders.status', '-l', '10');

    const sql = stdout.join('');
    expect(sql.split('\n')).toContain("\\set schema_name 'public'");
    expect(sql.endsWith('ORDER BY freq DESC LIMIT 10;\n')).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it('prints a GUI script for MySQL', async () => {
    await run('script', '--dialect', 'mysql', '--variant', 'gui', '-s', 'shop');
    expect(stdout.join('').split('\n')).toContain("-- Targets database 'shop'.");
  });

  it('writes to a file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'sqlscope-cli-'));
    try {
      const file = path.join(dir, 'extract.sql');
      await run('script', '-d', 'pg', '-o', file);

      expect(await readFile(file, 'utf-8')).toContain("\\echo '=== SCHEMA OVERVIEW ==='");
      expect(stdout).toEqual([]);
      expect(stderr).toHaveLength(1);
      expect(stderr[0]).toContain(`Wrote ${file}`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('reports a malformed column and sets the exit code', async () => {
    await run('script', '-d', 'pg', '--columns', 'status');

    expect(stdout).toEqual([]);
    expect(stderr[0]).toContain('Error [INVALID_COLUMN_REF]: Invalid column reference "status".');
    expect(process.exitCode).toBe(1);
  });
});

describe('live commands', () => {
  it('report a missing URI before connecting', async () => {
    vi.stubEnv('SQLSCOPE_URI', '');
    await run('overview');

    expect(stderr[0]).toContain('Error [CONFIG_INVALID]: Invalid configuration at "uri"');
    expect(stderr[1]).toContain('Fix: Set SQLSCOPE_URI, pass --uri, or add "uri:" to sqlscope.yaml.');
    expect(process.exitCode).toBe(1);
  });

  it('report an unsupported URI', async () => {
    await run('distincts', 'orders.status', '--uri', 'sqlite://app.db');
    expect(stderr[0]).toContain('Error [UNSUPPORTED_DIALECT]');
    expect(process.exitCode).toBe(1);
  });
});

describe('reportError', () => {
  it('prints code, message and fix on separate lines', () => {
    reportError(invalidColumnRefError('orders'));
    expect(stderr).toHaveLength(2);
    expect(stderr[0]).toContain('Error [INVALID_COLUMN_REF]: Invalid column reference "orders".');
    expect(stderr[0]).not.toContain('Fix:');
    expect(stderr[1]).toContain('Fix: Use "table.column" or "schema.table.column"');
  });

  it('prints plain errors', () => {
    reportError(new Error('boom'));
    expect(stderr).toEqual([expect.stringContaining('Error: boom')]);
  });
});

describe('parseLimit', () => {
  it('accepts whole numbers including 0', () => {
    expect(parseLimit('0')).toBe(0);
    expect(parseLimit('250')).toBe(250);
  });

  it('rejects anything else', () => {
    expect(() => parseLimit('-1')).toThrow(InvalidArgumentError);
    expect(() => parseLimit('ten')).toThrow(InvalidArgumentError);
  });
});
