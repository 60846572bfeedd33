/**
 * Config manager - handles reading, writing, and modifying config
 */

import { ConfigError } from '../errors.js';
import type { FieldType } from '../query/types.js';
import { type Config, defaultConfig } from '../types/index.js';
import { resolveConfigPath } from '../utils/config-path.js';
import { atomicWriteJson, fileExists, readFileSafe } from '../utils/fs.js';
import { parseConfig, validateConfig, type ValidationError, type ValidationResult } from './schema.js';

function describeErrors(errors: ValidationError[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ');
}

export class ConfigManager {
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = resolveConfigPath({ configPath });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async exists(): Promise<boolean> {
    return fileExists(this.configPath);
  }

  /**
   * Read and validate the file; every call reads it again
   * @throws ConfigError when the file is missing or invalid
   */
  async load(): Promise<Config> {
    const content = await readFileSafe(this.configPath);
    if (content === null) {
      throw new ConfigError(`Config file not found: ${this.configPath}`, this.configPath);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new ConfigError(`Invalid config: ${describeErrors(errors)}`, this.configPath);
    }

    return config;
  }

  /**
   * Defaults when no config file exists; an invalid file still throws
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return defaultConfig();
    }
    return this.load();
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new ConfigError(`Invalid config: ${describeErrors(result.errors)}`, this.configPath);
    }

    await atomicWriteJson(this.configPath, config);
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save(defaultConfig());
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await readFileSafe(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }

  // Custom search attribute declarations

  async addCustomField(name: string, type: FieldType): Promise<void> {
    const config = await this.load();
    if (name in config.query.customFields) {
      throw new ConfigError(`Custom field '${name}' already declared`, this.configPath);
    }
    await this.save({
      ...config,
      query: { ...config.query, customFields: { ...config.query.customFields, [name]: type } },
    });
  }

  async removeCustomField(name: string): Promise<void> {
    const config = await this.load();
    if (!(name in config.query.customFields)) {
      throw new ConfigError(`Custom field not found: ${name}`, this.configPath);
    }
    const customFields = Object.fromEntries(
      Object.entries(config.query.customFields).filter(([field]) => field !== name)
    );
    await this.save({ ...config, query: { ...config.query, customFields } });
  }
}
