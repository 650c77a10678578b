/**
 * Deploy command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as logger from '../utils/logger.js';
import { DEFAULT_CONFIG, loadConfig } from '../../core/config/index.js';
import { deploy } from '../../core/deployer/index.js';
import { SshTransport } from '../../core/transport/index.js';
import { DeployError, errorMessage } from '../../core/utils/errors.js';
import { formatBytes, formatDuration } from '../../core/utils/format.js';

/**
 * Deploy command options
 */
interface DeployCommandOptions {
  host?: string;
  remotePath?: string;
  source?: string;
  skipBackup?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Replaceable collaborators of the command
 */
export interface DeployCommandDependencies {
  /** Deployment entry point (defaults to the core `deploy`) */
  deploy?: typeof deploy;
}

/**
 * Create deploy command
 */
export function createDeployCommand(dependencies: DeployCommandDependencies = {}): Command {
  const command = new Command('deploy');

  command
    .description('Package the source directory and install it on the device')
    .option('--host <host>', `SSH target (default: ${DEFAULT_CONFIG.host})`)
    .option(
      '--remote-path <path>',
      `Remote install path (default: ${DEFAULT_CONFIG.remotePath})`
    )
    .option('--source <path>', `Local source directory (default: ${DEFAULT_CONFIG.sourceDir})`)
    .option('--skip-backup', 'Do not create a backup tarball on the target before replacing')
    .option('--dry-run', 'Build the archive and show the plan without connecting')
    .option('-v, --verbose', 'List archive entries and the remote command')
    .action(async (options: DeployCommandOptions) => {
      try {
        await deployCommand(options, dependencies);
      } catch (error: unknown) {
        logger.error(errorMessage(error));
        if (error instanceof DeployError && error.kind === 'transport') {
          logger.info('Nothing is retried; re-run the deployment once the problem is fixed.');
        }
        process.exit(1);
      }
    });

  return command;
}

/**
 * Deploy command handler
 */
async function deployCommand(
  options: DeployCommandOptions,
  dependencies: DeployCommandDependencies
): Promise<void> {
  const { dryRun = false, verbose = false } = options;
  const { deploy: runDeploy = deploy } = dependencies;

  console.log();
  console.log(chalk.bold.blue('Venus OS Deployment'));
  console.log();

  const config = loadConfig({
    overrides: {
      host: options.host,
      remotePath: options.remotePath,
      sourceDir: options.source,
      skipBackup: options.skipBackup,
    },
  });

  logger.keyValue('Host', config.host);
  logger.keyValue('Remote path', config.remotePath);
  logger.keyValue('Source', config.sourceDir);
  logger.keyValue('Backup', config.skipBackup ? 'skipped' : 'enabled');
  console.log();

  if (dryRun) {
    logger.warn('Dry-run mode enabled - nothing will be uploaded');
  }

  const result = await runDeploy(
    config,
    {
      transport: new SshTransport(config.host),
      reporter: logger.createConsoleReporter(verbose),
    },
    { dryRun }
  );

  logger.section('Deployment Summary');
  logger.keyValue('Archive root', result.archive.rootName);
  logger.keyValue('Files', String(result.archive.files));
  logger.keyValue('Archive size', formatBytes(result.archive.size));
  logger.keyValue('Duration', formatDuration(result.durationMs));

  console.log();
  if (result.dryRun) {
    console.log(chalk.yellow.bold('Dry run finished, nothing was deployed.'));
  } else if (result.backupRequested) {
    console.log(chalk.green.bold('Deployment completed successfully (previous install backed up).'));
  } else {
    console.log(chalk.green.bold('Deployment completed successfully (no backup performed).'));
  }
  console.log();
}
