/**
 * Config system entry point
 */

import type { DeployConfig, LoadConfigOptions } from '../../types/config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { loadEnvFiles, readEnvOverrides } from './env-loader.js';
import { mergeConfig } from './merger.js';
import { validateConfig } from './schema.js';

/**
 * Load and validate deployment configuration
 *
 * Priority (highest to lowest):
 * 1. CLI options
 * 2. VENUS_* environment variables (including .env.local and .env)
 * 3. Built-in defaults
 *
 * @example
 * ```ts
 * const config = loadConfig({ overrides: { skipBackup: true } });
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<DeployConfig> {
  const { overrides = {}, cwd = process.cwd(), env = process.env, loadEnv = true } = options;

  if (loadEnv) {
    loadEnvFiles(cwd, env);
  }

  return validateConfig(mergeConfig(DEFAULT_CONFIG, readEnvOverrides(env), overrides));
}

export { DEFAULT_CONFIG } from './defaults.js';
export { ENV_FILES, ENV_KEYS, loadEnvFiles, readEnvOverrides, parseBoolean } from './env-loader.js';
export { mergeConfig } from './merger.js';
export { configSchema, validateConfig, formatIssues } from './schema.js';

// Re-export types
export type { DeployConfig, ConfigOverrides, LoadConfigOptions } from '../../types/config.js';
