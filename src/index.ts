/**
 * venus-deploy - package a directory and install it on a Venus OS device over SSH
 *
 * Main library exports
 */

// Export types
export * from './types/config.js';
export * from './types/deployer.js';

// Export core functionality
export * from './core/config/index.js';
export * from './core/deployer/index.js';
export * from './core/transport/index.js';
export { DeployError, errorMessage } from './core/utils/errors.js';
export type { DeployErrorKind } from './core/utils/errors.js';
export { formatBytes, formatDuration } from './core/utils/format.js';
