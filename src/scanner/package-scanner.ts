import path from 'node:path';
import { hasVersionToken, stripExtension } from '../utils/identifier.js';
import { logger } from '../utils/logger.js';
import { scanDirectory } from './file-scanner.js';
import type { ScanOptions } from './types.js';

/**
 * Derives the identifier of a package-definition file
 * @param filePath - Path to the file
 * @param extension - Package-definition extension
 * @returns The file stem, or null if it lacks the extension or a version token
 *
 * @example
 * packageIdentifierFromPath('/repo/g/GCC/GCC-11.2.0.eb', '.eb')
 * // Returns: 'GCC-11.2.0'
 */
export function packageIdentifierFromPath(filePath: string, extension: string): string | null {
  const stem = stripExtension(path.basename(filePath), extension);
  if (stem === null || !hasVersionToken(stem)) {
    return null;
  }
  return stem;
}

/**
 * Scans a repository for package-definition files and returns their identifiers.
 * A missing root is not an error and yields an empty list.
 */
export async function scanPackageFiles(rootPath: string, options: ScanOptions): Promise<string[]> {
  const filePaths = await scanDirectory(rootPath, options);
  const identifiers: string[] = [];

  for (const filePath of filePaths) {
    const identifier = packageIdentifierFromPath(filePath, options.extension);
    if (identifier === null) {
      logger.debug(`Skipping unversioned package file: ${filePath}`);
      continue;
    }
    identifiers.push(identifier);
  }

  return identifiers;
}
