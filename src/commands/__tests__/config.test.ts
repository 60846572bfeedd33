/**
 * Config command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { join } from 'path';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { createConfigCommand } from '../config.js';
import { setOutputOptions } from '../../utils/output.js';

describe('config command', () => {
  let program: Command;
  let tempDir: string;
  let configPath: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]) => program.parseAsync(['node', 'test', 'config', ...args]);

  async function customFields(): Promise<unknown> {
    const saved: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
    return typeof saved === 'object' && saved !== null && 'query' in saved ? saved.query : undefined;
  }

  beforeEach(async () => {
    setOutputOptions({ json: false, verbose: false });
    tempDir = await mkdtemp(join(tmpdir(), 'wfscope-test-'));
    configPath = join(tempDir, 'nested', 'config.json');

    program = new Command();
    program.addCommand(createConfigCommand(() => configPath));

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates the config once', async () => {
    await run('init');
    await run('init');

    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      `✓ Config created at: ${configPath}`,
      `Config already exists at: ${configPath}\nUse --force to overwrite.`,
    ]);
  });

  it('shows defaults when no file exists', async () => {
    await run('show');

    expect(logSpy.mock.calls[0][0]).toBe(`# No config at ${configPath}, showing defaults`);
  });

  it('adds and removes a custom field', async () => {
    await run('init');

    await run('custom-field', 'add', 'Priority', 'Int');
    expect(await customFields()).toEqual({ maxLimit: 50, customFields: { Priority: 'Int' } });
    expect(logSpy).toHaveBeenLastCalledWith("✓ Custom field 'Priority' (Int) added");

    await run('custom-field', 'remove', 'Priority');
    expect(await customFields()).toEqual({ maxLimit: 50, customFields: {} });
  });

  it('rejects an unknown field type', async () => {
    await run('init');

    await expect(run('custom-field', 'add', 'Priority', 'Number')).rejects.toThrow('exit called');

    expect(errorSpy).toHaveBeenCalledWith(
      "Error: Failed to add custom field: Unknown field type 'Number' " +
        '(expected one of: Keyword, Text, Int, Double, Bool, Datetime, KeywordList)'
    );
  });

  it('refuses to shadow a builtin field', async () => {
    await run('init');

    await expect(run('custom-field', 'add', 'WorkflowType', 'Keyword')).rejects.toThrow('exit called');

    expect(await customFields()).toEqual({ maxLimit: 50, customFields: {} });
  });

  it('reports validation errors', async () => {
    await expect(run('validate')).rejects.toThrow('exit called');

    expect(logSpy).toHaveBeenCalledWith('Config validation failed:\n  - : Config file not found');
  });
});
