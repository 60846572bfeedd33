/**
 * Logger
 *
 * Structured logging to stderr only (stdout carries command output, which
 * may be JSON).
 *
 * Log levels:
 * - ERROR: Always output (red)
 * - WARN: Always output (yellow)
 * - INFO: Only when verbose mode enabled (no color)
 */

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

const COLORS = {
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  RESET: '\x1b[0m',
} as const;

export { COLORS as LOG_COLORS };

/** Global verbose flag - set from --verbose */
let verboseMode = false;

/**
 * Get current time in HH:MM:SS.mmm format
 */
function now(): string {
  return new Date().toISOString().slice(11, 23);
}

function log(level: LogLevel, msg: string, category?: string): void {
  if (level === 'INFO' && !verboseMode) {
    return;
  }

  const categoryStr = category ? `[${category}] ` : '';
  const prefix = `[${now()}] [${level}] ${categoryStr}`;

  if (level === 'INFO') {
    process.stderr.write(prefix + msg + '\n');
  } else {
    const color = COLORS[level];
    process.stderr.write(color + prefix + msg + COLORS.RESET + '\n');
  }
}

/**
 * Set verbose mode (enables INFO logs)
 */
export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

export function isVerbose(): boolean {
  return verboseMode;
}

/**
 * Logger instance with optional category support
 */
export const logger = {
  /**
   * Info level - only shown when verbose mode is enabled
   */
  info: (msg: string, category?: string): void => log('INFO', msg, category),

  /**
   * Warning level - always shown (yellow)
   */
  warn: (msg: string, category?: string): void => log('WARN', msg, category),

  /**
   * Error level - always shown (red)
   */
  error: (msg: string, category?: string): void => log('ERROR', msg, category),
};
