/**
 * Config commands
 */

import { Command } from 'commander';
import { ConfigError } from '../errors.js';
import { ConfigManager } from '../config/index.js';
import { FIELD_TYPES, isFieldType } from '../query/types.js';
import { output, outputSuccess, outputError, maskConfig, getOutputOptions } from '../utils/output.js';

export function createConfigCommand(getConfigPath: () => string): Command {
  const cmd = new Command('config')
    .description('Manage wfscope configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const configPath = getConfigPath();
      output({ path: configPath }, configPath);
    });

  cmd
    .command('init')
    .description('Initialize a new config file')
    .option('-f, --force', 'Overwrite existing config')
    .option('-p, --path <path>', 'Custom config path')
    .action(async (options: { force?: boolean; path?: string }) => {
      try {
        const configPath = options.path || getConfigPath();
        const manager = new ConfigManager(configPath);
        const result = await manager.init(options.force);

        if (result.created) {
          outputSuccess(`Config created at: ${result.path}`);
        } else {
          output(
            { exists: true, path: result.path },
            `Config already exists at: ${result.path}\nUse --force to overwrite.`
          );
        }
      } catch (error) {
        outputError('Failed to initialize config', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  cmd
    .command('show')
    .description('Show the effective config (secrets masked)')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const exists = await manager.exists();
        const config = await manager.loadOrDefault();
        const masked = maskConfig(config);

        if (getOutputOptions().json) {
          output(masked);
        } else {
          if (!exists) {
            console.log(`# No config at ${manager.getConfigPath()}, showing defaults`);
          }
          console.log(JSON.stringify(masked, null, 2));
        }
      } catch (error) {
        outputError('Failed to load config', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      try {
        const manager = new ConfigManager(getConfigPath());
        const result = await manager.validate();

        if (result.valid) {
          outputSuccess('Config is valid');
        } else {
          output(
            { valid: false, errors: result.errors },
            `Config validation failed:\n${result.errors.map(e => `  - ${e.path}: ${e.message}`).join('\n')}`
          );
          process.exit(1);
        }
      } catch (error) {
        outputError('Failed to validate config', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  const fields = cmd
    .command('custom-field')
    .description('Manage custom search attributes known to the query validator');

  fields
    .command('add')
    .description('Declare a custom search attribute')
    .argument('<name>', 'Search attribute name')
    .argument('<type>', `One of: ${FIELD_TYPES.join(', ')}`)
    .action(async (name: string, type: string) => {
      try {
        if (!isFieldType(type)) {
          throw new ConfigError(`Unknown field type '${type}' (expected one of: ${FIELD_TYPES.join(', ')})`, getConfigPath());
        }
        const manager = new ConfigManager(getConfigPath());
        await manager.addCustomField(name, type);
        outputSuccess(`Custom field '${name}' (${type}) added`, { name, type });
      } catch (error) {
        outputError('Failed to add custom field', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  fields
    .command('remove')
    .description('Forget a custom search attribute')
    .argument('<name>', 'Search attribute name')
    .action(async (name: string) => {
      try {
        const manager = new ConfigManager(getConfigPath());
        await manager.removeCustomField(name);
        outputSuccess(`Custom field '${name}' removed`, { name });
      } catch (error) {
        outputError('Failed to remove custom field', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });

  return cmd;
}
