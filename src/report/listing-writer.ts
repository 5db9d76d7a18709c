import fs from 'node:fs/promises';
import path from 'node:path';
import type { ComparisonResult } from '../comparator/types.js';
import { logger } from '../utils/logger.js';
import type { ListingOutput, WrittenListings } from './types.js';

/**
 * Formats identifiers one per line, each line newline-terminated
 * @param identifiers - Sorted identifiers
 * @returns Listing text; empty string for an empty list
 */
export function formatListing(identifiers: string[]): string {
  return identifiers.map(id => `${id}\n`).join('');
}

/**
 * Writes both difference listings, replacing any existing files
 */
export async function writeListings(
  result: ComparisonResult,
  output: ListingOutput
): Promise<WrittenListings> {
  const directory = path.resolve(output.directory);
  await fs.mkdir(directory, { recursive: true });

  const written: WrittenListings = {
    filesWithoutManifest: path.join(directory, output.filesWithoutManifest),
    manifestWithoutFiles: path.join(directory, output.manifestWithoutFiles)
  };

  logger.debug(`Writing ${result.filesWithoutManifest.length} entries to ${written.filesWithoutManifest}`);
  await fs.writeFile(written.filesWithoutManifest, formatListing(result.filesWithoutManifest), 'utf-8');

  logger.debug(`Writing ${result.manifestWithoutFiles.length} entries to ${written.manifestWithoutFiles}`);
  await fs.writeFile(written.manifestWithoutFiles, formatListing(result.manifestWithoutFiles), 'utf-8');

  return written;
}
