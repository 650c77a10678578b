/**
 * Configuration layer merger
 */

import type { ConfigOverrides, DeployConfig } from '../../types/config.js';

/**
 * Merge layers left to right; later layers win, undefined values are skipped
 */
export function mergeConfig(
  base: Readonly<DeployConfig>,
  ...layers: ConfigOverrides[]
): DeployConfig {
  const result: DeployConfig = { ...base };

  for (const layer of layers) {
    if (layer.host !== undefined) result.host = layer.host;
    if (layer.remotePath !== undefined) result.remotePath = layer.remotePath;
    if (layer.sourceDir !== undefined) result.sourceDir = layer.sourceDir;
    if (layer.skipBackup !== undefined) result.skipBackup = layer.skipBackup;
  }

  return result;
}
