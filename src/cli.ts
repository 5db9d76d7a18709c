import { buildApplication, buildCommand } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { parseExampleCount } from './config/config.js';
import { reconcileModules } from './reconcile-modules.js';
import { logger } from './utils/logger.js';

export const USAGE = 'Usage: reconcile-modules <root_path> <modules_file> [-v|--verbose] [--examples N]';

interface ReconcileFlags {
  verbose: boolean;
  examples?: number;
  config?: string;
  'output-dir'?: string;
  extension?: string;
  debug: boolean;
}

export const reconcileCommand = buildCommand({
  docs: {
    brief: 'Compare package-definition files in a repository with a module manifest'
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'Directory to search recursively for package-definition files',
          parse: String,
          placeholder: 'root_path',
          optional: true
        },
        {
          brief: 'Text file listing the installed modules',
          parse: String,
          placeholder: 'modules_file',
          optional: true
        }
      ]
    },
    flags: {
      verbose: {
        kind: 'boolean',
        brief: 'Print sample entries from each difference',
        default: false
      },
      examples: {
        kind: 'parsed',
        brief: 'Number of sample entries to print in verbose mode (default 5)',
        parse: parseExampleCount,
        optional: true
      },
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      'output-dir': {
        kind: 'parsed',
        brief: 'Directory to write the listings to (default: current directory)',
        parse: String,
        optional: true
      },
      extension: {
        kind: 'parsed',
        brief: 'Package-definition file extension (default .eb)',
        parse: String,
        optional: true
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      v: 'verbose',
      c: 'config',
      o: 'output-dir',
      d: 'debug'
    }
  },
  async func(
    this: CommandContext,
    flags: ReconcileFlags,
    rootPath: string | undefined,
    modulesFile: string | undefined
  ): Promise<void> {
    if (rootPath === undefined || modulesFile === undefined) {
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }

    try {
      await reconcileModules({
        rootPath,
        modulesFile,
        configPath: flags.config,
        verbose: flags.verbose,
        examples: flags.examples,
        outputDir: flags['output-dir'],
        extension: flags.extension,
        debug: flags.debug
      });
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      if (logger.isDebugEnabled() && error instanceof Error && error.stack) {
        console.error(error.stack);
      }
      process.exitCode = 1;
    }
  }
});

export const app = buildApplication(reconcileCommand, {
  name: 'reconcile-modules'
});
