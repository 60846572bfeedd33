import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import { expandHome, getDefaultConfigPath, resolveConfigPath } from './config-path.js';

describe('config-path', () => {
  describe('resolveConfigPath', () => {
    const env = { WFSCOPE_CONFIG: '/env/path/config.json', XDG_CONFIG_HOME: '/xdg' };

    it('prefers --config', () => {
      expect(resolveConfigPath({ configPath: '/custom/config.json', env })).toBe('/custom/config.json');
    });

    it('falls back to WFSCOPE_CONFIG, ignoring an empty --config', () => {
      expect(resolveConfigPath({ env })).toBe('/env/path/config.json');
      expect(resolveConfigPath({ configPath: '', env })).toBe('/env/path/config.json');
    });

    it('uses the OS default last', () => {
      expect(resolveConfigPath({ env: {} })).toBe(getDefaultConfigPath({}));
    });

    it('expands a leading ~', () => {
      expect(resolveConfigPath({ configPath: '~/wf/config.json', env: {} })).toBe(join(homedir(), 'wf', 'config.json'));
    });
  });

  describe('getDefaultConfigPath', () => {
    it('follows XDG_CONFIG_HOME on Linux', () => {
      expect(getDefaultConfigPath({ XDG_CONFIG_HOME: '/xdg' }, 'linux')).toBe(join('/xdg', 'wfscope', 'config.json'));
    });

    it('uses ~/.config without XDG_CONFIG_HOME', () => {
      expect(getDefaultConfigPath({}, 'linux')).toBe(join(homedir(), '.config', 'wfscope', 'config.json'));
    });

    it('uses APPDATA on Windows', () => {
      expect(getDefaultConfigPath({ APPDATA: 'C:\\Users\\me\\AppData\\Roaming' }, 'win32')).toBe(
        join('C:\\Users\\me\\AppData\\Roaming', 'wfscope', 'config.json')
      );
    });
  });

  describe('expandHome', () => {
    it('leaves other paths alone', () => {
      expect(expandHome('/etc/wfscope.json')).toBe('/etc/wfscope.json');
      expect(expandHome('~other/config.json')).toBe('~other/config.json');
      expect(expandHome('~')).toBe(homedir());
    });
  });
});
