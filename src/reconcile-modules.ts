import path from 'node:path';
import { loadConfig, validateConfig } from './config/config.js';
import type { ReconcileConfig } from './config/types.js';
import { readManifest } from './manifest/manifest-reader.js';
import { scanPackageFiles } from './scanner/package-scanner.js';
import { compareIdentifierSets, getComparisonStats } from './comparator/module-comparator.js';
import type { ComparisonResult, ComparisonStats } from './comparator/types.js';
import { writeListings } from './report/listing-writer.js';
import { formatSummary, formatVerboseSamples } from './report/summary.js';
import type { SummaryContext, WrittenListings } from './report/types.js';
import { logger } from './utils/logger.js';

export interface ReconcileModulesOptions {
  /** Directory searched recursively for package-definition files */
  rootPath: string;

  /** Manifest text file listing installed modules */
  modulesFile: string;

  configPath?: string;
  verbose?: boolean;
  examples?: number;
  outputDir?: string;
  extension?: string;
  debug?: boolean;
}

export interface ReconcileOutcome {
  result: ComparisonResult;
  stats: ComparisonStats;
  written: WrittenListings;
}

/**
 * Main entry point for module reconciliation
 */
export async function reconcileModules(options: ReconcileModulesOptions): Promise<ReconcileOutcome> {
  try {
    if (options.debug) {
      logger.enableDebug();
    }

    if (options.configPath) {
      logger.info(`Loading configuration from: ${path.resolve(options.configPath)}`);
    }
    const config = await loadConfig(options.configPath);
    applyOverrides(config, options);
    validateConfig(config);

    const outcome = await performReconciliation(options.rootPath, options.modulesFile, config);

    outputSummary(outcome, config);

    logger.success('Reconciliation complete!');
    return outcome;
  } catch (error) {
    logger.error('Reconciliation failed:', error instanceof Error ? error.message : String(error));
    throw error;
  }
}

function applyOverrides(config: ReconcileConfig, options: ReconcileModulesOptions): void {
  if (options.verbose) {
    config.report.verbose = true;
  }
  if (options.examples !== undefined) {
    config.report.examples = options.examples;
  }
  if (options.outputDir) {
    config.output.directory = options.outputDir;
  }
  if (options.extension) {
    config.packageExtension = options.extension;
  }
}

/**
 * Reads, scans, compares and writes the listings
 */
async function performReconciliation(
  rootPath: string,
  modulesFile: string,
  config: ReconcileConfig
): Promise<ReconcileOutcome> {
  logger.info(`Reading modules from: ${modulesFile}`);
  const manifestIds = await readManifest(modulesFile);
  logger.debug(`Sample manifest identifiers: ${manifestIds.slice(0, 3).join(', ')}`);

  logger.info(`Scanning ${rootPath} for *${config.packageExtension} files...`);
  const fileIds = await scanPackageFiles(rootPath, {
    extension: config.packageExtension,
    excludeDirs: config.scan.excludeDirs,
    includeHidden: config.scan.includeHidden,
    followSymlinks: config.scan.followSymlinks
  });
  logger.debug(`Sample package identifiers: ${fileIds.slice(0, 3).join(', ')}`);

  if (fileIds.length === 0) {
    logger.warn(`No versioned ${config.packageExtension} files found under ${rootPath}; check the root path`);
  }

  logger.info('Comparing identifier sets...');
  const result = compareIdentifierSets(fileIds, manifestIds);
  const stats = getComparisonStats(result, fileIds.length, manifestIds.length);

  const written = await writeListings(result, {
    directory: config.output.directory ?? process.cwd(),
    filesWithoutManifest: config.output.filesWithoutManifest,
    manifestWithoutFiles: config.output.manifestWithoutFiles
  });

  return { result, stats, written };
}

function outputSummary(outcome: ReconcileOutcome, config: ReconcileConfig): void {
  const context: SummaryContext = {
    packageExtension: config.packageExtension,
    filesWithoutManifestName: config.output.filesWithoutManifest,
    manifestWithoutFilesName: config.output.manifestWithoutFiles
  };

  const lines = formatSummary(outcome.stats, context);
  if (config.report.verbose) {
    lines.push('', ...formatVerboseSamples(outcome.result, context, config.report.examples));
  }

  console.log('\n' + lines.join('\n'));
}
