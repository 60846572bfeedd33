/**
 * Config path resolution
 *
 * Priority:
 * 1) --config <path>
 * 2) WFSCOPE_CONFIG environment variable
 * 3) OS standard config location
 *
 * A leading ~ in 1) or 2) is expanded (shells leave it alone inside quotes).
 */

import { homedir } from 'os';
import { join } from 'path';

export const CONFIG_ENV_VAR = 'WFSCOPE_CONFIG';

const APP_DIR = 'wfscope';

type Env = Readonly<Record<string, string | undefined>>;

export function getDefaultConfigDir(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  const home = homedir();
  switch (platform) {
    case 'win32':
      return join(env.APPDATA || join(home, 'AppData', 'Roaming'), APP_DIR);
    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_DIR);
    default:
      return join(env.XDG_CONFIG_HOME || join(home, '.config'), APP_DIR);
  }
}

export function getDefaultConfigPath(env: Env = process.env, platform: NodeJS.Platform = process.platform): string {
  return join(getDefaultConfigDir(env, platform), 'config.json');
}

export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path;
}

export interface ConfigPathOptions {
  /** --config argument */
  configPath?: string;
  env?: Env;
}

export function resolveConfigPath(options: ConfigPathOptions = {}): string {
  const env = options.env ?? process.env;
  const explicit = options.configPath || env[CONFIG_ENV_VAR];
  return explicit ? expandHome(explicit) : getDefaultConfigPath(env);
}
