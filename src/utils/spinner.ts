/**
 * Spinner for temporal CLI calls
 *
 * Shown on stderr only for an interactive TTY without --json, so piped or
 * JSON output never carries spinner frames.
 */

import ora, { type Ora } from 'ora';
import { getOutputOptions } from './output.js';

/**
 * stdin, stdout and stderr all attached to a terminal
 */
export function isInteractiveTTY(): boolean {
  return (
    process.stdin.isTTY === true &&
    process.stdout.isTTY === true &&
    process.stderr.isTTY === true
  );
}

/**
 * Windows consoles and PowerShell hosts (PSModulePath or
 * POWERSHELL_DISTRIBUTION_CHANNEL set) render progress frames as CLIXML noise
 */
export function spinnerDisabledByPlatform(): boolean {
  if (process.platform === 'win32') {
    return true;
  }
  return Boolean(process.env.PSModulePath || process.env.POWERSHELL_DISTRIBUTION_CHANNEL);
}

/** Braille spinner frames */
export const BRAILLE_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/** Never in --json mode, never without a terminal, otherwise unless the platform disables it */
export function shouldShowSpinner(): boolean {
  if (getOutputOptions().json) {
    return false;
  }
  if (!isInteractiveTTY()) {
    return false;
  }
  return !spinnerDisabledByPlatform();
}

/**
 * Create and start a spinner on stderr
 * @returns null when spinners are disabled
 */
export function createSpinner(text: string): Ora | null {
  if (!shouldShowSpinner()) {
    return null;
  }

  const spinner = ora({
    text,
    stream: process.stderr,
    spinner: {
      frames: BRAILLE_FRAMES,
      interval: 80,
    },
  });

  // Ctrl-C while spinning: clear the line, exit 130 (128 + SIGINT)
  let cleanupCalled = false;
  const cleanup = () => {
    if (cleanupCalled) return;
    cleanupCalled = true;
    spinner.stop();
    process.exit(130);
  };

  process.on('SIGINT', cleanup);
  spinner.start();

  const removeCleanup = () => {
    if (!cleanupCalled) {
      process.removeListener('SIGINT', cleanup);
    }
  };

  const originalStop = spinner.stop.bind(spinner);
  const originalSucceed = spinner.succeed.bind(spinner);
  const originalFail = spinner.fail.bind(spinner);

  spinner.stop = () => {
    removeCleanup();
    return originalStop();
  };

  spinner.succeed = (text?: string) => {
    removeCleanup();
    return originalSucceed(text);
  };

  spinner.fail = (text?: string) => {
    removeCleanup();
    return originalFail(text);
  };

  return spinner;
}

/**
 * Run an async operation with a spinner
 *
 * @example
 * ```typescript
 * const count = await withSpinner('Counting executions...', () => client.count(query));
 * ```
 */
export async function withSpinner<T>(text: string, fn: () => Promise<T>): Promise<T> {
  const spinner = createSpinner(text);

  try {
    const result = await fn();
    spinner?.succeed();
    return result;
  } catch (error) {
    spinner?.fail();
    throw error;
  }
}
