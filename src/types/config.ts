/**
 * Configuration types for venus-deploy
 */

/**
 * Resolved deployment configuration (one per invocation)
 */
export interface DeployConfig {
  /** SSH connection target, e.g. root@10.1.87.45 */
  host: string;

  /** Absolute install directory on the device */
  remotePath: string;

  /** Local directory to package */
  sourceDir: string;

  /** Skip the timestamped backup of the previous install */
  skipBackup: boolean;
}

/**
 * Partial configuration coming from one layer (env, CLI)
 */
export type ConfigOverrides = Partial<DeployConfig>;

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Values given on the command line (highest priority) */
  overrides?: ConfigOverrides;

  /** Directory containing .env files (defaults to process.cwd()) */
  cwd?: string;

  /** Environment to read VENUS_* variables from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;

  /** Load .env files before reading the environment */
  loadEnv?: boolean;
}
