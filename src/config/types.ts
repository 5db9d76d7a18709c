/**
 * Configuration for module reconciliation
 */
export interface ReconcileConfig {
  /** Extension of package-definition files, including the dot */
  packageExtension: string;

  /** Repository scan settings */
  scan: {
    /** Directory names to exclude (e.g., ["archive", "__archive__"]) */
    excludeDirs: string[];

    /** Whether to descend into and match dot-prefixed entries */
    includeHidden: boolean;

    /** Whether to resolve symlinked files and directories */
    followSymlinks: boolean;
  };

  /** Output listing settings */
  output: {
    /** Directory the listings are written to (null = current directory) */
    directory: string | null;

    /** File name for package files lacking a manifest entry */
    filesWithoutManifest: string;

    /** File name for manifest entries lacking a package file */
    manifestWithoutFiles: string;
  };

  /** Summary settings */
  report: {
    /** Whether to print sample entries of each difference */
    verbose: boolean;

    /** Number of sample entries per difference in verbose mode */
    examples: number;
  };
}

/**
 * Partial configuration as read from a config file
 */
export interface ReconcileConfigFile {
  packageExtension?: string;
  scan?: Partial<ReconcileConfig['scan']>;
  output?: Partial<ReconcileConfig['output']>;
  report?: Partial<ReconcileConfig['report']>;
}
