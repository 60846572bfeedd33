/**
 * File system helpers for the config file and structured query documents
 */

import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';

function hasCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}

/**
 * Write via a sibling temp file and rename, creating parent directories.
 * Readers see the old content or the new, never a partial file.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = join(dir, `.${basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/** Two-space JSON with a trailing newline */
export function atomicWriteJson(filePath: string, value: unknown): Promise<void> {
  return atomicWriteFile(filePath, JSON.stringify(value, null, 2) + '\n');
}

/**
 * @returns null when the file (or one of its parent directories) does not exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (hasCode(error, 'ENOENT', 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

/** True for a regular file; directories and missing paths are false */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error: unknown) {
    if (hasCode(error, 'ENOENT', 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}
