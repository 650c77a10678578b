/**
 * Environment variables loader
 * Reads .env files and maps VENUS_* variables onto configuration fields
 */

import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ConfigOverrides } from '../../types/config.js';

/**
 * .env files in priority order (highest first)
 */
export const ENV_FILES = ['.env.local', '.env'] as const;

/**
 * Variable name for each configuration field
 */
export const ENV_KEYS = {
  host: 'VENUS_HOST',
  remotePath: 'VENUS_REMOTE_PATH',
  sourceDir: 'VENUS_SOURCE',
  skipBackup: 'VENUS_SKIP_BACKUP',
} as const;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/**
 * Load .env files into `target` without overriding variables that are
 * already set, so the real environment wins over .env.local over .env
 *
 * @param configDir - Directory containing .env files
 * @param target - Environment to populate (defaults to process.env)
 * @returns Names of the files that were loaded
 */
export function loadEnvFiles(
  configDir: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env
): string[] {
  const loadedFiles: string[] = [];

  for (const file of ENV_FILES) {
    const filePath = resolve(configDir, file);

    if (!existsSync(filePath)) {
      continue;
    }

    const parsed = parse(readFileSync(filePath));
    for (const [key, value] of Object.entries(parsed)) {
      if (target[key] === undefined) {
        target[key] = value;
      }
    }
    loadedFiles.push(file);
  }

  return loadedFiles;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function parseBoolean(value: string): boolean {
  return TRUTHY.has(value.trim().toLowerCase());
}

/**
 * Read configuration overrides from VENUS_* variables; unset or empty
 * variables are left out
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const host = readString(env, ENV_KEYS.host);
  if (host) overrides.host = host;

  const remotePath = readString(env, ENV_KEYS.remotePath);
  if (remotePath) overrides.remotePath = remotePath;

  const sourceDir = readString(env, ENV_KEYS.sourceDir);
  if (sourceDir) overrides.sourceDir = sourceDir;

  const skipBackup = readString(env, ENV_KEYS.skipBackup);
  if (skipBackup) overrides.skipBackup = parseBoolean(skipBackup);

  return overrides;
}
