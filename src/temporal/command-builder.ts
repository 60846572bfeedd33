/**
 * Argument vectors for the temporal CLI
 *
 *   temporal [--env E] [--address A] [--namespace N] -o json --time-format iso workflow <sub> ...
 *
 * Read-only subcommands only.
 */

import type { TemporalSettings } from '../types/config.js';
import type { CommandSpec } from './types.js';

export const API_KEY_ENV = 'TEMPORAL_API_KEY';

export class TemporalCommandBuilder {
  constructor(private readonly settings: TemporalSettings) {}

  globalFlags(): string[] {
    const flags: string[] = [];
    if (this.settings.env) {
      flags.push('--env', this.settings.env);
    }
    if (this.settings.address) {
      flags.push('--address', this.settings.address);
    }
    if (this.settings.namespace) {
      flags.push('--namespace', this.settings.namespace);
    }
    flags.push('-o', 'json', '--time-format', 'iso');
    return flags;
  }

  count(query?: string): string[] {
    const args = ['workflow', 'count'];
    if (query) {
      args.push('--query', query);
    }
    return args;
  }

  list(query: string | undefined, limit: number): string[] {
    const args = ['workflow', 'list', '--limit', String(limit)];
    if (query) {
      args.push('--query', query);
    }
    return args;
  }

  show(workflowId: string, runId?: string): string[] {
    return withRun(['workflow', 'show', '--workflow-id', workflowId], runId);
  }

  describe(workflowId: string, runId?: string): string[] {
    return withRun(['workflow', 'describe', '--workflow-id', workflowId], runId);
  }

  stack(workflowId: string, runId?: string): string[] {
    return withRun(['workflow', 'stack', '--workflow-id', workflowId], runId);
  }

  /** `input` is passed through as JSON text, one --input per query argument */
  query(workflowId: string, queryType: string, input?: string, runId?: string): string[] {
    const args = withRun(['workflow', 'query', '--workflow-id', workflowId], runId);
    args.push('--type', queryType);
    if (input !== undefined) {
      args.push('--input', input);
    }
    return args;
  }

  /**
   * Complete invocation: binary, global flags, subcommand args.
   * The API key travels in the environment so it never shows up in process listings.
   */
  build(workflowArgs: string[]): CommandSpec {
    return {
      command: this.settings.binary,
      args: [...this.globalFlags(), ...workflowArgs],
      ...(this.settings.apiKey ? { env: { [API_KEY_ENV]: this.settings.apiKey } } : {}),
    };
  }
}

function withRun(args: string[], runId?: string): string[] {
  if (runId) {
    args.push('--run-id', runId);
  }
  return args;
}
