/**
 * Remote install script builder
 * Every interpolated path goes through shellQuote
 */

import { posix } from 'node:path';
import type { RemoteLayout } from '../../types/deployer.js';
import { DeployError } from '../utils/errors.js';

const REMOTE_TEMP_DIR = '/tmp';
const ARCHIVE_SUFFIX = '-deploy.tar.gz';

/**
 * Remote `date` format for backup names (YYYYMMDDHHMMSS, sortable)
 */
export const BACKUP_TIMESTAMP_FORMAT = '+%Y%m%d%H%M%S';

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a value for a POSIX shell. Safe words are returned unchanged.
 *
 * @example
 * ```ts
 * shellQuote('/data/apps');  // /data/apps
 * shellQuote("it's here");   // 'it'"'"'s here'
 * ```
 */
export function shellQuote(value: string): string {
  if (value === '') {
    return "''";
  }
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Derive parent directory, target name and upload path from the install path
 */
export function resolveRemoteLayout(remotePath: string): RemoteLayout {
  if (!posix.isAbsolute(remotePath)) {
    throw new DeployError('input', `Remote path must be absolute: ${remotePath}`);
  }

  const targetPath = posix.normalize(remotePath).replace(/\/+$/, '');
  const targetName = posix.basename(targetPath);

  if (targetName === '') {
    throw new DeployError('input', `Remote path cannot be the root directory: ${remotePath}`);
  }

  return {
    targetPath,
    parentDir: posix.dirname(targetPath),
    targetName,
    remoteArchive: posix.join(REMOTE_TEMP_DIR, `${targetName}${ARCHIVE_SUFFIX}`),
  };
}

/**
 * Back up an existing install as `<name>-backup-<timestamp>.tar.gz`.
 * Runs in the parent directory; refuses to overwrite an existing backup.
 */
export function buildBackupCommand(targetName: string): string {
  const name = shellQuote(targetName);
  const backup = `${name}-backup-"$TS".tar.gz`;

  return [
    `if [ -d ${name} ]; then TS=$(date ${BACKUP_TIMESTAMP_FORMAT})`,
    `if [ -e ${backup} ]; then echo 'backup already exists, not overwriting it' >&2; exit 1; fi`,
    `tar czf ${backup} ${name}; fi`,
  ].join('; ');
}

/**
 * Compose the single remote command that backs up (optionally),
 * replaces the install and removes the uploaded archive
 */
export function buildInstallScript(
  layout: RemoteLayout,
  options: { backup: boolean }
): string {
  const parent = shellQuote(layout.parentDir);
  const name = shellQuote(layout.targetName);
  const archive = shellQuote(layout.remoteArchive);

  const steps = [`mkdir -p ${parent}`, `cd ${parent}`];

  if (options.backup) {
    steps.push(buildBackupCommand(layout.targetName));
  }

  steps.push(
    `rm -rf ${name}`,
    `tar xzf ${archive} -C ${parent}`,
    `rm -f ${archive}`
  );

  return steps.join('; ');
}
