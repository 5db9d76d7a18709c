import fs from 'node:fs/promises';
import { PATH_SEPARATOR, hasVersionToken, normalizeIdentifier } from '../utils/identifier.js';
import { logger } from '../utils/logger.js';
import type { ManifestLine } from './types.js';

/**
 * Classifies one raw manifest line
 * @param raw - Line as read from the manifest, possibly with surrounding whitespace
 * @returns The classified line; only `module` lines are kept by the reader
 *
 * @example
 * classifyManifestLine('gcc/11.2.0')
 * // Returns: { kind: 'module', text: 'gcc/11.2.0', identifier: 'gcc-11.2.0' }
 */
export function classifyManifestLine(raw: string): ManifestLine {
  const text = raw.trim();

  if (text.length === 0) {
    return { kind: 'blank', text };
  }

  // e.g. "compiler/" headings from `module avail`
  if (text.endsWith(PATH_SEPARATOR)) {
    return { kind: 'category-marker', text };
  }

  // e.g. "/apps/modules/all:" path headers and free-form notes
  if (text.includes(':')) {
    return { kind: 'path-annotation', text };
  }

  if (!hasVersionToken(text)) {
    return { kind: 'category-name', text };
  }

  return { kind: 'module', text, identifier: normalizeIdentifier(text) };
}

/**
 * Parses manifest text into module identifiers
 * @param content - Full manifest text
 * @returns Identifiers in manifest order, duplicates included
 */
export function parseManifest(content: string): string[] {
  const identifiers: string[] = [];

  for (const raw of content.split(/\r?\n/)) {
    const line = classifyManifestLine(raw);
    if (line.kind === 'module') {
      identifiers.push(line.identifier);
    } else if (line.kind !== 'blank') {
      logger.debug(`Skipping manifest line (${line.kind}): ${line.text}`);
    }
  }

  return identifiers;
}

/**
 * Reads a manifest file and returns its module identifiers
 * @param manifestPath - Path to the manifest text file
 * @throws Error if the file is missing or cannot be read
 */
export async function readManifest(manifestPath: string): Promise<string[]> {
  let content: string;

  try {
    content = await fs.readFile(manifestPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Manifest file not found: ${manifestPath}`, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read manifest file ${manifestPath}: ${reason}`, { cause: error });
  }

  return parseManifest(content);
}
