#!/usr/bin/env node
/**
 * wfscope CLI
 * Query and inspect Temporal workflows without drowning in output
 *
 * Command structure (git-style flat):
 *   wfscope query       # Build / validate visibility queries
 *   wfscope count       # Count matching executions
 *   wfscope list        # List executions (counted first, bounded)
 *   wfscope history     # Filtered, projected workflow history
 *   wfscope describe    # One execution
 *   wfscope trace       # Stack trace of a running workflow
 *   wfscope workflow-query # Run a workflow query handler
 *   wfscope failed-runs # Failed runs of one workflow id
 *   wfscope config      # Configuration
 *
 * Shortcuts:
 *   q = query, ls = list, h = history, c = config
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setVerbose } from './utils/logger.js';
import { setOutputOptions } from './utils/output.js';
import { setEnvOverride } from './commands/context.js';
import {
  createConfigCommand,
  createQueryCommand,
  createCountCommand,
  createListCommand,
  createHistoryCommand,
  createFailedRunsCommand,
  createDescribeCommand,
  createTraceCommand,
  createWorkflowQueryCommand,
} from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: unknown = require('../package.json');
const VERSION =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const program = new Command();

// Global state for config path
let globalConfigPath: string | undefined;

function getConfigPath(): string {
  return resolveConfigPath({ configPath: globalConfigPath });
}

const HELP_HEADER = `
wfscope - Temporal workflow query and history inspector
Count before you list; filter before you read.

Common Commands:
  count         Count executions matching a query
  list, ls      List executions (bounded by query.maxLimit)
  history, h    Show a filtered workflow history
  describe      Describe one execution
  trace         Stack trace of a running workflow
  workflow-query  Run a query handler on a workflow
  failed-runs   Count failed runs of a workflow id

Management:
  query, q      Build, validate and explore queries
  config, c     Configuration management

Examples:
  wfscope count "WorkflowType = 'OrderFlow'"
  wfscope list "ExecutionStatus = 'Failed'" --limit 10
  wfscope history order-123 --preset last_failure_context
  wfscope history order-123 --include ActivityTaskFailed --projection full
  wfscope query validate "WorkflowId LIKE 'order-%'"
`;

function withAlias(create: (getConfigPath: () => string) => Command, alias: string, target: string): Command {
  return create(getConfigPath).name(alias).description(`Alias for ${target}`);
}

program
  .name('wfscope')
  .description('Temporal workflow query and history inspector')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('-e, --env <name>', 'temporal CLI environment (overrides temporal.env)')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string; env?: string; json?: boolean; verbose?: boolean }>();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
    setVerbose(opts.verbose ?? false);
    setEnvOverride(opts.env);
  });

program.addCommand(createCountCommand(getConfigPath));

program.addCommand(createListCommand(getConfigPath));
program.addCommand(withAlias(createListCommand, 'ls', 'list'));

program.addCommand(createHistoryCommand(getConfigPath));
program.addCommand(withAlias(createHistoryCommand, 'h', 'history'));

program.addCommand(createDescribeCommand(getConfigPath));
program.addCommand(createTraceCommand(getConfigPath));
program.addCommand(createWorkflowQueryCommand(getConfigPath));
program.addCommand(createFailedRunsCommand(getConfigPath));

program.addCommand(createQueryCommand(getConfigPath));
program.addCommand(withAlias(createQueryCommand, 'q', 'query'));

program.addCommand(createConfigCommand(getConfigPath));
program.addCommand(withAlias(createConfigCommand, 'c', 'config'));

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
