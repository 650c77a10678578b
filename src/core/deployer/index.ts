/**
 * Deployer module
 *
 * Path filtering, archiving and the deployment flow
 */

// Path filter
export {
  DEFAULT_FILTER_RULES,
  pathComponents,
  isExcluded,
  isIncluded,
} from './path-filter.js';

// Archive builder
export {
  assertSourceDirectory,
  collectEntries,
  buildArchive,
  withArchive,
} from './archive-builder.js';
export type { ArchiveManifest } from './archive-builder.js';

// Orchestrator
export { deploy, silentReporter } from './orchestrator.js';

// Re-export types
export type {
  FilterRules,
  ArchiveResult,
  ArchiveOptions,
  ArchiveBuilder,
  RemoteLayout,
  Transport,
  DeployReporter,
  DeployDependencies,
  DeployOptions,
  DeployResult,
} from '../../types/deployer.js';
