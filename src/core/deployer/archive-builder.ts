/**
 * Archive builder
 * Packages the source directory into a gzip tarball rooted at its base name
 */

import glob from 'fast-glob';
import { create } from 'tar';
import { rmSync } from 'node:fs';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join, resolve } from 'node:path';
import type {
  ArchiveBuilder,
  ArchiveOptions,
  ArchiveResult,
  FilterRules,
} from '../../types/deployer.js';
import { DeployError, errorMessage } from '../utils/errors.js';
import { DEFAULT_FILTER_RULES, isIncluded } from './path-filter.js';

const TEMP_PREFIX = 'venus-deploy-';

/**
 * Entries selected for the archive
 */
export interface ArchiveManifest {
  rootName: string;
  /** Archive paths (`<root>/...`), root first */
  entries: string[];
  /** Number of non-directory entries */
  files: number;
}

/**
 * Resolve the source path and make sure it is a directory
 *
 * @returns Absolute source path
 */
export async function assertSourceDirectory(sourceDir: string): Promise<string> {
  const absolute = resolve(sourceDir);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(absolute)).isDirectory();
  } catch (error) {
    throw new DeployError('input', `Source directory not found: ${absolute}`, {
      cause: error,
    });
  }

  if (!isDirectory) {
    throw new DeployError('input', `Source directory not found: ${absolute} is not a directory`);
  }
  if (basename(absolute) === '') {
    throw new DeployError('input', `Cannot deploy the filesystem root: ${absolute}`);
  }

  return absolute;
}

/**
 * Glob patterns that keep fast-glob out of excluded directories.
 * The path filter still decides; these only prune the walk.
 */
function pruneGlobs(rules: FilterRules): string[] {
  return [...rules.names].flatMap((name) => {
    const escaped = glob.escapePath(name);
    return [`**/${escaped}`, `**/${escaped}/**`];
  });
}

/**
 * Walk the source directory and select the entries to archive
 */
export async function collectEntries(
  sourceDir: string,
  rules: FilterRules = DEFAULT_FILTER_RULES
): Promise<ArchiveManifest> {
  const root = resolve(sourceDir);
  const rootName = basename(root);

  const found = await glob('**', {
    cwd: root,
    dot: true,
    onlyFiles: false,
    markDirectories: true,
    followSymbolicLinks: false,
    ignore: pruneGlobs(rules),
  });

  const kept = found
    .filter((entry) => isIncluded(entry, rules))
    .sort();

  const entries = [
    rootName,
    ...kept.map((entry) => `${rootName}/${entry.replace(/\/$/, '')}`),
  ];
  const files = kept.filter((entry) => !entry.endsWith('/')).length;

  return { rootName, entries, files };
}

/**
 * Build `<root>.tar.gz` in a private temp directory, or in `workDir` when the
 * caller already owns one. The returned file is closed and complete.
 */
export const buildArchive: ArchiveBuilder = async (sourceDir, options = {}) => {
  const { rules = DEFAULT_FILTER_RULES, tempDir = tmpdir() } = options;
  const root = await assertSourceDirectory(sourceDir);

  const ownsWorkDir = options.workDir === undefined;
  const workDir = options.workDir ?? (await mkdtemp(join(tempDir, TEMP_PREFIX)));
  const archivePath = join(workDir, `${basename(root)}.tar.gz`);

  try {
    const manifest = await collectEntries(root, rules);

    await create(
      {
        gzip: true,
        file: archivePath,
        cwd: dirname(root),
        portable: true,
        noDirRecurse: true,
      },
      manifest.entries
    );

    const { size } = await stat(archivePath);

    return {
      path: archivePath,
      tempDir: workDir,
      ...manifest,
      size,
    };
  } catch (error) {
    await rm(ownsWorkDir ? workDir : archivePath, { recursive: true, force: true });
    throw new DeployError(
      'archive',
      `Failed to create archive from ${root}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
};

/**
 * Remove the temp directory if the process is interrupted, then re-raise
 *
 * @returns Function that detaches the handlers
 */
function removeOnSignal(dir: string): () => void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  const handler = (signal: NodeJS.Signals): void => {
    detach();
    rmSync(dir, { recursive: true, force: true });
    process.kill(process.pid, signal);
  };
  const detach = (): void => {
    for (const signal of signals) {
      process.off(signal, handler);
    }
  };

  for (const signal of signals) {
    process.once(signal, handler);
  }

  return detach;
}

/**
 * Build an archive, hand it to `run`, and delete it whatever happens
 *
 * @example
 * ```ts
 * await withArchive('dbus-serialbattery', async (archive) => {
 *   await transport.upload(archive.path, '/tmp/dbus-serialbattery-deploy.tar.gz');
 * });
 * ```
 */
export async function withArchive<T>(
  sourceDir: string,
  run: (archive: ArchiveResult) => Promise<T>,
  options: ArchiveOptions & { build?: ArchiveBuilder } = {}
): Promise<T> {
  const { build = buildArchive, tempDir = tmpdir(), ...archiveOptions } = options;

  // Signal cleanup covers the build as well as `run`
  const workDir = await mkdtemp(join(tempDir, TEMP_PREFIX));
  const detach = removeOnSignal(workDir);

  try {
    const archive = await build(sourceDir, { ...archiveOptions, tempDir, workDir });
    return await run(archive);
  } finally {
    detach();
    await rm(workDir, { recursive: true, force: true });
  }
}
