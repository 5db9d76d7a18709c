import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { ComparisonResult, ComparisonStats } from '../comparator/types.js';
import type { SummaryContext } from './types.js';

/**
 * Formats the run summary
 * @param colors - Chalk instance; pass one with level 0 for plain text
 */
export function formatSummary(
  stats: ComparisonStats,
  context: SummaryContext,
  colors: ChalkInstance = chalk
): string[] {
  const ext = context.packageExtension;

  return [
    `Results written to ${context.filesWithoutManifestName} and ${context.manifestWithoutFilesName}`,
    `Found ${stats.packageFiles} ${ext} files and ${stats.manifestEntries} modules`,
    `${colors.yellow(stats.filesWithoutManifest.toString())} ${ext} files without modules`,
    `${colors.magenta(stats.manifestWithoutFiles.toString())} modules without ${ext} files`
  ];
}

/**
 * Formats a sample of a difference set
 * @param title - Heading for the sample
 * @param identifiers - Sorted identifiers
 * @param limit - Maximum number of identifiers to show
 *
 * @example
 * formatSamples('Examples:', ['a', 'b', 'c'], 2)
 * // Returns: ['Examples:', '  a', '  b', '  ... (1 more)']
 */
export function formatSamples(
  title: string,
  identifiers: string[],
  limit: number,
  colors: ChalkInstance = chalk
): string[] {
  const lines = [colors.bold(title)];

  if (identifiers.length === 0) {
    lines.push(colors.gray('  None'));
    return lines;
  }

  for (const id of identifiers.slice(0, limit)) {
    lines.push(`  ${id}`);
  }

  const remaining = identifiers.length - limit;
  if (remaining > 0) {
    lines.push(colors.gray(`  ... (${remaining} more)`));
  }

  return lines;
}

/**
 * Formats samples of both difference sets for verbose output
 */
export function formatVerboseSamples(
  result: ComparisonResult,
  context: SummaryContext,
  limit: number,
  colors: ChalkInstance = chalk
): string[] {
  const ext = context.packageExtension;

  return [
    ...formatSamples(`Examples of ${ext} files without modules:`, result.filesWithoutManifest, limit, colors),
    '',
    ...formatSamples(`Examples of modules without ${ext} files:`, result.manifestWithoutFiles, limit, colors)
  ];
}
