/**
 * Deployer-related type definitions
 */

/**
 * Exclusion rules applied to every archive entry
 */
export interface FilterRules {
  /** Path components that exclude an entry and its subtree */
  names: ReadonlySet<string>;

  /** Filename suffixes that exclude a file */
  suffixes: readonly string[];
}

/**
 * Local archive produced for one deployment
 */
export interface ArchiveResult {
  /** Absolute path to the .tar.gz file */
  path: string;

  /** Private directory holding the archive; removed together with it */
  tempDir: string;

  /** Top-level entry name (source directory base name) */
  rootName: string;

  /** Archive entry paths, root first */
  entries: string[];

  /** Number of non-directory entries in the archive */
  files: number;

  /** Compressed size in bytes */
  size: number;
}

/**
 * Options for building an archive
 */
export interface ArchiveOptions {
  /** Exclusion rules (defaults to DEFAULT_FILTER_RULES) */
  rules?: FilterRules;

  /** Parent for the private temp directory (defaults to os.tmpdir()) */
  tempDir?: string;

  /**
   * Existing directory to write the archive into. The caller owns it:
   * it is not created, and not removed on failure.
   */
  workDir?: string;
}

export type ArchiveBuilder = (
  sourceDir: string,
  options?: ArchiveOptions
) => Promise<ArchiveResult>;

/**
 * Remote file layout derived from the install path
 */
export interface RemoteLayout {
  /** Normalised absolute install path */
  targetPath: string;

  /** Directory the archive is extracted into */
  parentDir: string;

  /** Final path component of the install path */
  targetName: string;

  /** Upload destination of the archive */
  remoteArchive: string;
}

/**
 * Moves the archive and runs the install script on the device
 */
export interface Transport {
  upload(localPath: string, remoteDestination: string): Promise<void>;
  execute(command: string): Promise<void>;
}

/**
 * Progress sink for the orchestrator; core code never prints directly
 */
export interface DeployReporter {
  step(index: number, total: number, message: string): void;
  info(message: string): void;
  success(message: string): void;
  verbose(message: string): void;
  task<T>(message: string, run: () => Promise<T>): Promise<T>;
}

/**
 * Collaborators of a deployment run
 */
export interface DeployDependencies {
  transport: Transport;
  ensureTools?: () => Promise<void>;
  buildArchive?: ArchiveBuilder;
  reporter?: DeployReporter;
}

/**
 * Deployment run options
 */
export interface DeployOptions {
  /** Build the archive and report the plan without touching the network */
  dryRun?: boolean;

  /** Archive options passed to the builder */
  archive?: ArchiveOptions;
}

/**
 * Outcome of a deployment run
 */
export interface DeployResult {
  archive: {
    rootName: string;
    entries: number;
    files: number;
    size: number;
  };
  remoteArchive: string;
  script: string;
  backupRequested: boolean;
  dryRun: boolean;
  durationMs: number;
}
