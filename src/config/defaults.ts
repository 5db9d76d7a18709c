import type { ReconcileConfig } from './types.js';

/**
 * Default configuration values
 */
export const defaultConfig: ReconcileConfig = {
  packageExtension: '.eb',
  scan: {
    excludeDirs: [],
    includeHidden: false,
    followSymlinks: true
  },
  output: {
    directory: null,
    filesWithoutManifest: 'ext_eb_repo.txt',
    manifestWithoutFiles: 'ext_modules.txt'
  },
  report: {
    verbose: false,
    examples: 5
  }
};
