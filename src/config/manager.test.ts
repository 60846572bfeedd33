/**
 * Tests for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigManager } from './manager.js';
import { ConfigError } from '../errors.js';
import { defaultConfig } from '../types/index.js';
import { join } from 'path';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'wfscope-test-'));
    configPath = join(tempDir, 'nested', 'config.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('exposes the resolved path', () => {
    const manager = new ConfigManager(configPath);
    expect(manager.getConfigPath()).toBe(configPath);
  });

  it('sees edits made to the file between loads', async () => {
    const manager = new ConfigManager(configPath);
    await manager.init();
    expect((await manager.load()).query.maxLimit).toBe(defaultConfig().query.maxLimit);

    await writeFile(configPath, JSON.stringify({ ...defaultConfig(), query: { maxLimit: 7, customFields: {} } }));

    expect((await manager.load()).query.maxLimit).toBe(7);
  });

  it('falls back to defaults when no file exists', async () => {
    const manager = new ConfigManager(configPath);
    await expect(manager.loadOrDefault()).resolves.toEqual(defaultConfig());
  });

  it('throws ConfigError from load() when the file is missing', async () => {
    const manager = new ConfigManager(configPath);
    await expect(manager.load()).rejects.toThrow(ConfigError);
  });

  it('still throws for an invalid file in loadOrDefault()', async () => {
    const path = join(tempDir, 'bad.json');
    await writeFile(path, JSON.stringify({ ...defaultConfig(), query: { maxLimit: 0, customFields: {} } }));

    const manager = new ConfigManager(path);
    await expect(manager.loadOrDefault()).rejects.toThrow(
      'Invalid config: query.maxLimit: maxLimit must be a positive integer'
    );
  });

  it('creates the default config on init, creating directories', async () => {
    const manager = new ConfigManager(configPath);

    await expect(manager.init()).resolves.toEqual({ created: true, path: configPath });
    const written: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
    expect(written).toEqual(defaultConfig());
  });

  it('does not overwrite without force', async () => {
    const manager = new ConfigManager(configPath);
    await manager.init();
    await manager.addCustomField('Region', 'Keyword');

    await expect(manager.init()).resolves.toEqual({ created: false, path: configPath });
    await expect(manager.init(true)).resolves.toEqual({ created: true, path: configPath });
    expect((await manager.load()).query.customFields).toEqual({});
  });

  it('refuses to save an invalid config', async () => {
    const manager = new ConfigManager(configPath);
    const config = defaultConfig();
    config.history.payloadMaxLen = 0;

    await expect(manager.save(config)).rejects.toThrow(ConfigError);
  });

  it('adds and removes custom fields', async () => {
    const manager = new ConfigManager(configPath);
    await manager.init();

    await manager.addCustomField('Priority', 'Int');
    expect((await manager.load()).query.customFields).toEqual({ Priority: 'Int' });

    await expect(manager.addCustomField('Priority', 'Keyword')).rejects.toThrow(
      "Custom field 'Priority' already declared"
    );

    await manager.removeCustomField('Priority');
    expect((await manager.load()).query.customFields).toEqual({});
    await expect(manager.removeCustomField('Priority')).rejects.toThrow('Custom field not found: Priority');
  });

  it('rejects custom fields that shadow builtins', async () => {
    const manager = new ConfigManager(configPath);
    await manager.init();

    await expect(manager.addCustomField('WorkflowId', 'Keyword')).rejects.toThrow(ConfigError);
  });

  it('validates the file on disk', async () => {
    const manager = new ConfigManager(configPath);
    await expect(manager.validate()).resolves.toEqual({
      valid: false,
      errors: [{ path: '', message: 'Config file not found' }],
    });

    await manager.init();
    await expect(manager.validate()).resolves.toEqual({ valid: true, errors: [] });
  });
});
