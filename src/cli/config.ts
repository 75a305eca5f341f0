/**
 * CLI Configuration Utilities
 *
 * Resolves which configuration file applies to this invocation.
 */
import path from 'path';

import {
  CONFIG_PATH_ENV,
  type ConfigFile,
  DEFAULT_CONFIG_PATH,
  configExists,
  getDefaultConfig,
  loadConfig,
} from '../shared/config.js';

/**
 * Get the config file path: `--config`, then the environment, then the system default
 */
export function getConfigFilePath(customPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (customPath) {
    return path.resolve(customPath);
  }

  const fromEnv = env[CONFIG_PATH_ENV];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  return DEFAULT_CONFIG_PATH;
}

/**
 * Load the configuration for this run.
 *
 * Only the system default file is optional; a path the user named must exist.
 */
export async function loadConfigFile(customPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<ConfigFile> {
  const configPath = getConfigFilePath(customPath, env);
  const isExplicit = Boolean(customPath || env[CONFIG_PATH_ENV]);

  if (!isExplicit && !(await configExists(configPath))) {
    return getDefaultConfig();
  }

  return loadConfig(configPath);
}
