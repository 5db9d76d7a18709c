export interface ScanOptions {
  /** Package-definition extension including the dot (e.g. '.eb') */
  extension: string;

  /** Directory names to skip, compared case-insensitively */
  excludeDirs?: string[];

  /** Descend into and match dot-prefixed entries */
  includeHidden?: boolean;

  /** Resolve symlinked files and directories (default true) */
  followSymlinks?: boolean;
}
