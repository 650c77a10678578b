/**
 * Archive path filter
 */

import type { FilterRules } from '../../types/deployer.js';

/**
 * Version-control metadata, editor settings, caches and virtualenvs
 */
const EXCLUDED_NAMES = [
  '.git',
  '.github',
  '.vscode',
  '__pycache__',
  '.mypy_cache',
  '.pytest_cache',
  '.venv',
  'venv',
  'terminals',
] as const;

/**
 * Compiled bytecode and debug symbols
 */
const EXCLUDED_SUFFIXES = ['.pyc', '.pyo', '.pdb'] as const;

export const DEFAULT_FILTER_RULES: FilterRules = Object.freeze({
  names: new Set<string>(EXCLUDED_NAMES),
  suffixes: EXCLUDED_SUFFIXES,
});

/**
 * Split a relative path into its components (either separator)
 */
export function pathComponents(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter((part) => part.length > 0);
}

/**
 * Check if an entry (file or directory) must be left out of the archive.
 * A path under an excluded directory is excluded as well.
 */
export function isExcluded(
  relativePath: string,
  rules: FilterRules = DEFAULT_FILTER_RULES
): boolean {
  const parts = pathComponents(relativePath);

  if (parts.some((part) => rules.names.has(part))) {
    return true;
  }

  const name = parts[parts.length - 1] ?? '';
  return rules.suffixes.some((suffix) => name.endsWith(suffix));
}

export function isIncluded(
  relativePath: string,
  rules: FilterRules = DEFAULT_FILTER_RULES
): boolean {
  return !isExcluded(relativePath, rules);
}
