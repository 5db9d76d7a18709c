/**
 * Where the two listings are written
 */
export interface ListingOutput {
  /** Output directory; resolved against the current directory */
  directory: string;
  filesWithoutManifest: string;
  manifestWithoutFiles: string;
}

/**
 * Absolute paths of the listings after writing
 */
export interface WrittenListings {
  filesWithoutManifest: string;
  manifestWithoutFiles: string;
}

/**
 * Labels used when describing the comparison
 */
export interface SummaryContext {
  /** Package-definition extension (e.g. '.eb') */
  packageExtension: string;
  filesWithoutManifestName: string;
  manifestWithoutFilesName: string;
}
