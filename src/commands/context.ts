/**
 * Shared setup for commands that talk to temporal
 *
 * Loads the config (defaults when no file exists), configures the
 * process-wide field registry from query.customFields and wires the
 * temporal client into a WorkflowService.
 */

import { ConfigManager } from '../config/index.js';
import { InvalidQueryDocumentError } from '../errors.js';
import { defaultRegistry, type TypeRegistry } from '../query/registry.js';
import { loadStructuredQuery } from '../query/structured.js';
import type { Query } from '../query/types.js';
import { TemporalClient } from '../temporal/client.js';
import type { Config } from '../types/index.js';
import { readFileSafe } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { WorkflowService } from '../workflow/service.js';

export interface CommandContext {
  config: Config;
  registry: TypeRegistry;
  client: TemporalClient;
  service: WorkflowService;
}

/** --env given on the command line; wins over temporal.env in the config */
let envOverride: string | undefined;

export function setEnvOverride(env: string | undefined): void {
  envOverride = env;
}

/**
 * Load config and configure the registry only (no temporal client)
 */
export async function loadConfig(getConfigPath: () => string): Promise<Config> {
  const manager = new ConfigManager(getConfigPath());
  const config = await manager.loadOrDefault();
  defaultRegistry.configure(config.query.customFields);
  return config;
}

export async function createContext(getConfigPath: () => string): Promise<CommandContext> {
  const config = await loadConfig(getConfigPath);

  const temporal = envOverride ? { ...config.temporal, env: envOverride } : config.temporal;
  if (temporal.env) {
    logger.info(`Using temporal environment '${temporal.env}'`, 'config');
  }

  const client = new TemporalClient(temporal);
  const service = new WorkflowService(client, {
    maxLimit: config.query.maxLimit,
    payloadMaxLen: config.history.payloadMaxLen,
    failureContext: config.history.failureContext,
    registry: defaultRegistry,
  });

  return { config, registry: defaultRegistry, client, service };
}

/**
 * Query given as a filter string, or as a structured JSON/YAML file (--file)
 * @throws InvalidQueryDocumentError when the file cannot be used
 */
export async function readQueryInput(query: string | undefined, file: string | undefined): Promise<Query | string> {
  if (query !== undefined && file !== undefined) {
    throw new InvalidQueryDocumentError('Give either a query string or --file, not both');
  }
  if (file === undefined) {
    return query ?? '';
  }

  const content = await readFileSafe(file);
  if (content === null) {
    throw new InvalidQueryDocumentError(`File not found: ${file}`);
  }
  const result = loadStructuredQuery(content, defaultRegistry);
  if (!result.ok) {
    throw new InvalidQueryDocumentError(
      `Invalid query document ${file}: ${result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`
    );
  }
  return result.query;
}
