import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createSpinner, isInteractiveTTY, shouldShowSpinner, spinnerDisabledByPlatform, withSpinner } from './spinner.js';
import { setOutputOptions } from './output.js';

function setTTY(value: boolean | undefined): void {
  for (const stream of [process.stdin, process.stdout, process.stderr]) {
    Object.defineProperty(stream, 'isTTY', { value, configurable: true });
  }
}

describe('spinner', () => {
  const originalEnv = process.env;
  const originalPlatform = process.platform;
  const original = {
    stdin: process.stdin.isTTY,
    stdout: process.stdout.isTTY,
    stderr: process.stderr.isTTY,
  };

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.PSModulePath;
    delete process.env.POWERSHELL_DISTRIBUTION_CHANNEL;
    Object.defineProperty(process, 'platform', { value: 'linux' });
    setOutputOptions({ json: false });
  });

  afterEach(() => {
    process.env = originalEnv;
    Object.defineProperty(process, 'platform', { value: originalPlatform });
    Object.defineProperty(process.stdin, 'isTTY', { value: original.stdin, configurable: true });
    Object.defineProperty(process.stdout, 'isTTY', { value: original.stdout, configurable: true });
    Object.defineProperty(process.stderr, 'isTTY', { value: original.stderr, configurable: true });
    setOutputOptions({ json: false });
  });

  describe('isInteractiveTTY', () => {
    it('requires all three streams to be terminals', () => {
      setTTY(true);
      expect(isInteractiveTTY()).toBe(true);

      Object.defineProperty(process.stdout, 'isTTY', { value: undefined, configurable: true });
      expect(isInteractiveTTY()).toBe(false);
    });
  });

  describe('spinnerDisabledByPlatform', () => {
    it('is true on Windows', () => {
      Object.defineProperty(process, 'platform', { value: 'win32' });
      expect(spinnerDisabledByPlatform()).toBe(true);
    });

    it('is true under PowerShell on other platforms', () => {
      process.env.POWERSHELL_DISTRIBUTION_CHANNEL = 'PSCore-Linux';
      expect(spinnerDisabledByPlatform()).toBe(true);
    });

    it('is false on a plain Linux shell', () => {
      expect(spinnerDisabledByPlatform()).toBe(false);
    });
  });

  describe('shouldShowSpinner', () => {
    it('is false in --json mode even on a terminal', () => {
      setTTY(true);
      setOutputOptions({ json: true });
      expect(shouldShowSpinner()).toBe(false);
    });

    it('is false without a terminal', () => {
      setTTY(undefined);
      expect(shouldShowSpinner()).toBe(false);
    });

    it('follows the platform default on a terminal', () => {
      setTTY(true);
      expect(shouldShowSpinner()).toBe(true);

      Object.defineProperty(process, 'platform', { value: 'win32' });
      expect(shouldShowSpinner()).toBe(false);
    });
  });

  describe('createSpinner', () => {
    it('returns null when spinners are disabled', () => {
      setTTY(undefined);
      expect(createSpinner('Loading...')).toBeNull();
    });
  });

  describe('withSpinner', () => {
    beforeEach(() => {
      setTTY(undefined);
    });

    it('returns the result of the operation', async () => {
      await expect(withSpinner('Counting...', async () => 42)).resolves.toBe(42);
    });

    it('rethrows the operation error', async () => {
      await expect(
        withSpinner('Counting...', async () => {
          throw new Error('temporal failed');
        })
      ).rejects.toThrow('temporal failed');
    });
  });
});
