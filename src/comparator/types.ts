/**
 * Result of comparing package-file identifiers against manifest identifiers
 */
export interface ComparisonResult {
  /** Package files with no matching manifest entry */
  filesWithoutManifest: string[];

  /** Manifest entries with no matching package file */
  manifestWithoutFiles: string[];

  /** Identifiers present on both sides */
  inBoth: string[];
}

/**
 * Statistics about the comparison
 */
export interface ComparisonStats {
  /** Package files found, duplicates included */
  packageFiles: number;

  /** Manifest entries read, duplicates included */
  manifestEntries: number;

  uniquePackageFiles: number;
  uniqueManifestEntries: number;
  filesWithoutManifest: number;
  manifestWithoutFiles: number;
  inBoth: number;
}
