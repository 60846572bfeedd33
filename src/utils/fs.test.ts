import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { atomicWriteFile, atomicWriteJson, fileExists, readFileSafe } from './fs.js';

describe('fs utilities', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(join(tmpdir(), 'wfscope-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('atomicWriteFile', () => {
    it('creates parent directories', async () => {
      const filePath = join(testDir, 'nested', 'deep', 'config.json');

      await atomicWriteFile(filePath, '{}');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('{}');
    });

    it('replaces an existing file and leaves no temp files', async () => {
      const filePath = join(testDir, 'config.json');
      await fs.writeFile(filePath, 'old');

      await atomicWriteFile(filePath, 'new');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('new');
      expect(await fs.readdir(testDir)).toEqual(['config.json']);
    });

    it('removes the temp file when the rename fails', async () => {
      // Renaming a file over a directory fails
      const target = join(testDir, 'taken');
      await fs.mkdir(target);

      await expect(atomicWriteFile(target, 'x')).rejects.toThrow();
      expect(await fs.readdir(testDir)).toEqual(['taken']);
    });
  });

  describe('atomicWriteJson', () => {
    it('writes indented JSON with a trailing newline', async () => {
      const filePath = join(testDir, 'config.json');

      await atomicWriteJson(filePath, { version: 1, query: { maxLimit: 50 } });

      expect(await fs.readFile(filePath, 'utf-8')).toBe(
        '{\n  "version": 1,\n  "query": {\n    "maxLimit": 50\n  }\n}\n'
      );
    });
  });

  describe('readFileSafe', () => {
    it('returns the content', async () => {
      const filePath = join(testDir, 'query.yaml');
      await fs.writeFile(filePath, 'field: WorkflowId');

      expect(await readFileSafe(filePath)).toBe('field: WorkflowId');
    });

    it('returns null for a missing file or parent', async () => {
      expect(await readFileSafe(join(testDir, 'missing.json'))).toBeNull();

      await fs.writeFile(join(testDir, 'file'), '');
      expect(await readFileSafe(join(testDir, 'file', 'child.json'))).toBeNull();
    });

    it('rethrows other errors', async () => {
      await expect(readFileSafe(testDir)).rejects.toThrow();
    });
  });

  describe('fileExists', () => {
    it('is true only for regular files', async () => {
      const filePath = join(testDir, 'config.json');
      await fs.writeFile(filePath, '{}');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(testDir)).toBe(false);
      expect(await fileExists(join(testDir, 'missing.json'))).toBe(false);
    });
  });
});
