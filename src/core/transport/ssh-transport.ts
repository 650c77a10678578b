/**
 * SSH transport
 * Thin wrappers around the scp and ssh binaries
 */

import { spawn } from 'node:child_process';
import type { Transport } from '../../types/deployer.js';
import { DeployError, errorMessage } from '../utils/errors.js';

/**
 * Shell options that stop the remote script at the first failing step,
 * on unset variables and on pipeline failures
 */
export const FAIL_FAST_PREFIX = 'set -euo pipefail; ';

/**
 * Run an external command to completion
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<void>;

/**
 * Spawn without a shell and inherit stdio, so ssh can prompt for a password
 * and scp can draw its progress bar
 */
export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: 'inherit' });

    child.on('error', (error) => {
      reject(new Error(`Failed to start ${command}: ${error.message}`));
    });

    child.on('close', (code, signal) => {
      if (code === 0) {
        resolve();
      } else if (signal) {
        reject(new Error(`${command} was terminated by ${signal}`));
      } else {
        reject(new Error(`${command} exited with code ${code}`));
      }
    });
  });

export class SshTransport implements Transport {
  constructor(
    private readonly host: string,
    private readonly run: CommandRunner = spawnCommand
  ) {}

  /**
   * Copy one file to an explicit path on the device
   */
  async upload(localPath: string, remoteDestination: string): Promise<void> {
    const target = `${this.host}:${remoteDestination}`;

    try {
      await this.run('scp', [localPath, target]);
    } catch (error) {
      throw new DeployError('transport', `Upload to ${target} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Run a command string on the device under fail-fast shell options.
   * A failing sub-step is reported as a failure of the whole command.
   */
  async execute(command: string): Promise<void> {
    try {
      await this.run('ssh', [this.host, `${FAIL_FAST_PREFIX}${command}`]);
    } catch (error) {
      throw new DeployError(
        'transport',
        `Remote command on ${this.host} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
