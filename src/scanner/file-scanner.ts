import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import type { ScanOptions } from './types.js';

type EntryKind = 'file' | 'directory';

/**
 * Recursively scans a directory for files ending with the package extension.
 * Entries are visited in name order; a symlinked directory is not re-entered
 * while it is already on the current path.
 * @param dirPath - Directory path to scan
 * @param options - Scan options for filtering
 * @returns Array of matching file paths; empty if the directory does not exist
 */
export async function scanDirectory(
  dirPath: string,
  options: ScanOptions
): Promise<string[]> {
  const files: string[] = [];
  await scanDirectoryRecursive(dirPath, files, options, new Set());
  return files;
}

async function scanDirectoryRecursive(
  dirPath: string,
  files: string[],
  options: ScanOptions,
  ancestors: ReadonlySet<string>
): Promise<void> {
  let realDir: string;
  let entries: Dirent[];

  try {
    realDir = await fs.realpath(dirPath);
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'EACCES') {
      logger.warn(`Permission denied: ${dirPath}`);
      return;
    }
    if (code === 'ENOENT') {
      logger.warn(`Directory not found: ${dirPath}`);
      return;
    }
    logger.warn(`Error reading directory ${dirPath}:`, error);
    return;
  }

  if (ancestors.has(realDir)) {
    logger.debug(`Skipping symlink cycle: ${dirPath}`);
    return;
  }
  const lineage = new Set(ancestors).add(realDir);

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (!options.includeHidden && entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = path.join(dirPath, entry.name);
    const kind = await resolveEntryKind(entry, fullPath, options);

    if (kind === 'directory') {
      if (shouldExcludeDirectory(entry.name, options)) {
        logger.debug(`Excluding directory: ${fullPath}`);
        continue;
      }
      await scanDirectoryRecursive(fullPath, files, options, lineage);
    } else if (kind === 'file' && entry.name.endsWith(options.extension)) {
      files.push(fullPath);
    }
  }
}

/**
 * Classifies an entry, resolving symlinks to their target
 * @returns null for sockets, devices, broken links and skipped links
 */
async function resolveEntryKind(
  entry: Dirent,
  fullPath: string,
  options: ScanOptions
): Promise<EntryKind | null> {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  if (!entry.isSymbolicLink()) return null;

  if (options.followSymlinks === false) {
    logger.debug(`Skipping symlink: ${fullPath}`);
    return null;
  }

  try {
    const target = await fs.stat(fullPath);
    if (target.isDirectory()) return 'directory';
    if (target.isFile()) return 'file';
    return null;
  } catch (error) {
    logger.warn(`Broken symlink: ${fullPath}`);
    logger.debug(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

function shouldExcludeDirectory(dirName: string, options: ScanOptions): boolean {
  if (!options.excludeDirs || options.excludeDirs.length === 0) {
    return false;
  }

  const lowerDirName = dirName.toLowerCase();
  return options.excludeDirs.some(excluded => excluded.toLowerCase() === lowerDirName);
}
