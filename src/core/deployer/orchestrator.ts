/**
 * Deployment orchestrator
 * validate -> archive -> upload -> (backup) replace -> report
 */

import { basename } from 'node:path';
import type { DeployConfig } from '../../types/config.js';
import type {
  DeployDependencies,
  DeployOptions,
  DeployReporter,
  DeployResult,
  RemoteLayout,
} from '../../types/deployer.js';
import { buildInstallScript, resolveRemoteLayout } from '../transport/remote-script.js';
import { ensureTools } from '../transport/tools.js';
import { DeployError } from '../utils/errors.js';
import { formatBytes } from '../utils/format.js';
import { assertSourceDirectory, buildArchive, withArchive } from './archive-builder.js';

const TOTAL_STEPS = 4;

/**
 * Reporter that drops everything (library default)
 */
export const silentReporter: DeployReporter = {
  step: () => undefined,
  info: () => undefined,
  success: () => undefined,
  verbose: () => undefined,
  task: <T>(_message: string, run: () => Promise<T>): Promise<T> => run(),
};

/**
 * The archive is extracted into the remote parent directory, so its root
 * entry must carry the install directory's name
 */
function assertMatchingNames(sourceDir: string, layout: RemoteLayout): void {
  const rootName = basename(sourceDir);

  if (rootName !== layout.targetName) {
    throw new DeployError(
      'input',
      `Source directory name "${rootName}" does not match remote directory name "${layout.targetName}"; ` +
        `extracting it in ${layout.parentDir} would not replace ${layout.targetPath}`
    );
  }
}

/**
 * Package `config.sourceDir` and install it at `config.remotePath` on `config.host`.
 * The local archive is removed on every exit path.
 *
 * @example
 * ```ts
 * const result = await deploy(config, { transport: new SshTransport(config.host) });
 * ```
 */
export async function deploy(
  config: DeployConfig,
  dependencies: DeployDependencies,
  options: DeployOptions = {}
): Promise<DeployResult> {
  const {
    transport,
    ensureTools: checkTools = () => ensureTools(),
    buildArchive: build = buildArchive,
    reporter = silentReporter,
  } = dependencies;
  const { dryRun = false, archive: archiveOptions = {} } = options;
  const startTime = Date.now();

  // Validate before anything touches disk or network
  await checkTools();
  const sourceDir = await assertSourceDirectory(config.sourceDir);
  const layout = resolveRemoteLayout(config.remotePath);
  assertMatchingNames(sourceDir, layout);

  const backupRequested = !config.skipBackup;
  const script = buildInstallScript(layout, { backup: backupRequested });
  const target = `${config.host}:${layout.targetPath}`;

  reporter.step(1, TOTAL_STEPS, `Packaging ${sourceDir}`);

  return withArchive(
    sourceDir,
    async (archive) => {
      reporter.success(
        `Archive ready: ${archive.files} files, ${formatBytes(archive.size)}`
      );
      for (const entry of archive.entries) {
        reporter.verbose(entry);
      }

      const result = (): DeployResult => ({
        archive: {
          rootName: archive.rootName,
          entries: archive.entries.length,
          files: archive.files,
          size: archive.size,
        },
        remoteArchive: layout.remoteArchive,
        script,
        backupRequested,
        dryRun,
        durationMs: Date.now() - startTime,
      });

      if (dryRun) {
        reporter.info(`Dry run: would upload to ${config.host}:${layout.remoteArchive}`);
        reporter.info(`Dry run: would run on ${config.host}: ${script}`);
        return result();
      }

      reporter.step(2, TOTAL_STEPS, `Uploading archive to ${config.host}:${layout.remoteArchive}`);
      await transport.upload(archive.path, layout.remoteArchive);

      reporter.step(3, TOTAL_STEPS, `Deploying to ${target}`);
      reporter.verbose(script);
      await transport.execute(script);

      reporter.step(
        4,
        TOTAL_STEPS,
        backupRequested
          ? 'Done. Previous install (if any) backed up with timestamp suffix.'
          : 'Done. No backup performed.'
      );

      return result();
    },
    {
      ...archiveOptions,
      build: (dir, buildOptions) =>
        reporter.task(`Creating archive of ${basename(dir)}`, () => build(dir, buildOptions)),
    }
  );
}
