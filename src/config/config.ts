import fs from 'fs/promises';
import path from 'path';
import type { ReconcileConfig, ReconcileConfigFile } from './types.js';
import { defaultConfig } from './defaults.js';

/**
 * Merges a partial configuration over the defaults
 */
export function mergeConfig(userConfig: ReconcileConfigFile = {}): ReconcileConfig {
  return {
    packageExtension: userConfig.packageExtension ?? defaultConfig.packageExtension,
    scan: {
      ...defaultConfig.scan,
      excludeDirs: [...defaultConfig.scan.excludeDirs],
      ...userConfig.scan
    },
    output: {
      ...defaultConfig.output,
      ...userConfig.output
    },
    report: {
      ...defaultConfig.report,
      ...userConfig.report
    }
  };
}

/**
 * Loads configuration from a JSON file, or the defaults when no path is given
 * @param configPath - Optional path to the configuration file
 * @returns Loaded configuration merged with defaults
 */
export async function loadConfig(configPath?: string): Promise<ReconcileConfig> {
  if (!configPath) {
    return mergeConfig();
  }

  const resolved = path.resolve(configPath);
  let configContent: string;

  try {
    configContent = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Configuration file not found: ${resolved}`, { cause: error });
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(configContent);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Configuration error: invalid JSON in ${resolved}: ${reason}`, { cause: error });
  }

  const config = mergeConfig(checkConfigShape(parsed));
  validateConfig(config);

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks that the parsed file and its sections are objects. Field values are
 * checked by validateConfig once merged.
 */
function checkConfigShape(value: unknown): ReconcileConfigFile {
  if (!isRecord(value)) {
    throw new Error('Configuration error: configuration must be a JSON object');
  }

  for (const section of ['scan', 'output', 'report'] as const) {
    const sectionValue = value[section];
    if (sectionValue !== undefined && !isRecord(sectionValue)) {
      throw new Error(`Configuration error: ${section} must be an object`);
    }
  }

  return value as ReconcileConfigFile;
}

/**
 * Validates the configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: ReconcileConfig): void {
  const extension = config.packageExtension;
  if (typeof extension !== 'string' || !extension.startsWith('.') || extension.length < 2) {
    throw new Error('Configuration error: packageExtension must start with "." and name an extension');
  }

  const examples = config.report.examples;
  if (typeof examples !== 'number' || !Number.isInteger(examples) || examples < 0) {
    throw new Error('Configuration error: examples must be a non-negative integer');
  }

  const { filesWithoutManifest, manifestWithoutFiles } = config.output;
  if (
    typeof filesWithoutManifest !== 'string' ||
    typeof manifestWithoutFiles !== 'string' ||
    filesWithoutManifest.trim().length === 0 ||
    manifestWithoutFiles.trim().length === 0
  ) {
    throw new Error('Configuration error: output file names must be non-empty');
  }

  if (filesWithoutManifest === manifestWithoutFiles) {
    throw new Error('Configuration error: output file names must differ');
  }

  const directory: unknown = config.output.directory;
  if (directory !== null && typeof directory !== 'string') {
    throw new Error('Configuration error: output directory must be a string or null');
  }

  const flags: Array<[string, unknown]> = [
    ['includeHidden', config.scan.includeHidden],
    ['followSymlinks', config.scan.followSymlinks],
    ['verbose', config.report.verbose]
  ];
  for (const [name, value] of flags) {
    if (typeof value !== 'boolean') {
      throw new Error(`Configuration error: ${name} must be a boolean`);
    }
  }

  const excludeDirs: unknown = config.scan.excludeDirs;
  if (!Array.isArray(excludeDirs) || !excludeDirs.every(dir => typeof dir === 'string')) {
    throw new Error('Configuration error: excludeDirs must be an array of directory names');
  }
}

/**
 * Parses the `--examples` flag value
 * @throws Error unless the value is a non-negative integer
 */
export function parseExampleCount(input: string): number {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Expected a non-negative integer, got "${input}"`);
  }
  return Number.parseInt(trimmed, 10);
}
