/**
 * Built-in defaults, overridden by VENUS_* variables and CLI options
 */

import type { DeployConfig } from '../../types/config.js';

export const DEFAULT_CONFIG: Readonly<DeployConfig> = Object.freeze({
  host: 'root@10.1.87.45',
  remotePath: '/data/apps/dbus-serialbattery',
  sourceDir: 'dbus-serialbattery',
  skipBackup: false,
});
