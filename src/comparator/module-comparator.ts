import type { ComparisonResult, ComparisonStats } from './types.js';

/**
 * Compares package-file identifiers with manifest identifiers in both directions
 * @param fileIds - Identifiers derived from package-definition files
 * @param manifestIds - Identifiers read from the manifest
 * @returns Sorted, duplicate-free differences and intersection
 */
export function compareIdentifierSets(
  fileIds: string[],
  manifestIds: string[]
): ComparisonResult {
  const fileSet = new Set(fileIds);
  const manifestSet = new Set(manifestIds);

  const onlyIn = (side: Set<string>, other: Set<string>): string[] =>
    [...side].filter(id => !other.has(id)).sort();

  return {
    filesWithoutManifest: onlyIn(fileSet, manifestSet),
    manifestWithoutFiles: onlyIn(manifestSet, fileSet),
    inBoth: [...fileSet].filter(id => manifestSet.has(id)).sort()
  };
}

/**
 * Generates statistics from a comparison result
 * @param result - Comparison result
 * @param packageFiles - Number of package identifiers scanned, before deduplication
 * @param manifestEntries - Number of manifest identifiers read, before deduplication
 */
export function getComparisonStats(
  result: ComparisonResult,
  packageFiles: number,
  manifestEntries: number
): ComparisonStats {
  return {
    packageFiles,
    manifestEntries,
    uniquePackageFiles: result.filesWithoutManifest.length + result.inBoth.length,
    uniqueManifestEntries: result.manifestWithoutFiles.length + result.inBoth.length,
    filesWithoutManifest: result.filesWithoutManifest.length,
    manifestWithoutFiles: result.manifestWithoutFiles.length,
    inBoth: result.inBoth.length
  };
}
