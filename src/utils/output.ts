/**
 * Output utilities for CLI
 *
 * Command results go to stdout; errors to stderr. With --json every
 * helper emits JSON instead of the human-readable form.
 */

import { TemporalCliError } from '../errors.js';
import type { Config } from '../types/config.js';

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

/** Rewrite offered by query errors (UnsupportedOperatorError, UnknownFieldError) */
function suggestionOf(error: Error): string | undefined {
  return 'suggestion' in error && typeof error.suggestion === 'string' ? error.suggestion : undefined;
}

export function outputError(message: string, error?: Error): void {
  const suggestion = error ? suggestionOf(error) : undefined;

  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      type: error?.name,
      details: error?.message,
      ...(suggestion ? { suggestion } : {}),
    }));
    return;
  }

  console.error(error ? `Error: ${message}: ${error.message}` : `Error: ${message}`);
  if (suggestion && !error?.message.includes(suggestion)) {
    console.error(`  try: ${suggestion}`);
  }
  if (error && globalOptions.verbose) {
    if (error instanceof TemporalCliError && error.stderr.trim()) {
      console.error(`  $ ${error.argv.join(' ')}\n${error.stderr.trimEnd()}`);
    }
    console.error(error.stack);
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (globalOptions.json) {
    console.log(JSON.stringify({ success: true, message, ...(data !== undefined ? { data } : {}) }));
  } else {
    console.log(`✓ ${message}`);
  }
}

/**
 * Left-aligned columns separated by two spaces; trailing padding trimmed
 */
export function outputTable(headers: string[], rows: string[][]): void {
  if (globalOptions.json) {
    const objects = rows.map((row) => Object.fromEntries(headers.map((h, i) => [h, row[i] ?? ''])));
    console.log(JSON.stringify(objects, null, 2));
    return;
  }

  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const line = (cells: string[]) => headers.map((_, i) => (cells[i] ?? '').padEnd(widths[i])).join('  ').trimEnd();

  const headerLine = line(headers);
  console.log(headerLine);
  console.log('-'.repeat(headerLine.length));
  for (const row of rows) {
    console.log(line(row));
  }
}

export function maskSecret(value: string, showChars: number = 4): string {
  if (value.length <= showChars * 2) {
    return '****';
  }
  return value.slice(0, showChars) + '****' + value.slice(-showChars);
}

/** Config for display: the temporal API key is masked */
export function maskConfig(config: Config): Config {
  const { apiKey } = config.temporal;
  if (apiKey === undefined) {
    return config;
  }
  return { ...config, temporal: { ...config.temporal, apiKey: maskSecret(apiKey) } };
}
