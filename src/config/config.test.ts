import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfig, mergeConfig, parseExampleCount, validateConfig } from './config.js';
import { defaultConfig } from './defaults.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reconcile-modules-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should return defaults when no path is given', async () => {
    const config = await loadConfig();

    expect(config).toEqual(defaultConfig);
    expect(config.scan.excludeDirs).not.toBe(defaultConfig.scan.excludeDirs);
  });

  it('should load valid configuration', async () => {
    const configPath = path.join(tempDir, 'config.json');
    const testConfig = {
      packageExtension: '.spec',
      scan: { excludeDirs: ['__archive__'], includeHidden: true, followSymlinks: false },
      output: {
        directory: '/tmp/reports',
        filesWithoutManifest: 'extra-specs.txt',
        manifestWithoutFiles: 'extra-modules.txt'
      },
      report: { verbose: true, examples: 10 }
    };

    await fs.writeFile(configPath, JSON.stringify(testConfig, null, 2));

    const config = await loadConfig(configPath);

    expect(config).toEqual(testConfig);
  });

  it('should merge with defaults for partial config', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ report: { examples: 3 } }));

    const config = await loadConfig(configPath);

    expect(config.report).toEqual({ verbose: false, examples: 3 });
    expect(config.packageExtension).toBe('.eb');
    expect(config.output.filesWithoutManifest).toBe('ext_eb_repo.txt');
    expect(config.output.manifestWithoutFiles).toBe('ext_modules.txt');
  });

  it('should throw error for missing file', async () => {
    const configPath = path.join(tempDir, 'nonexistent.json');

    await expect(loadConfig(configPath)).rejects.toThrow('Configuration file not found');
  });

  it('should throw error for invalid JSON', async () => {
    const configPath = path.join(tempDir, 'invalid.json');
    await fs.writeFile(configPath, 'invalid json{{{');

    await expect(loadConfig(configPath)).rejects.toThrow('Configuration error: invalid JSON');
  });

  it('should reject a configuration that is not an object', async () => {
    const configPath = path.join(tempDir, 'config.json');

    for (const content of ['null', '[]', '"text"', '42']) {
      await fs.writeFile(configPath, content);
      await expect(loadConfig(configPath)).rejects.toThrow(
        'Configuration error: configuration must be a JSON object'
      );
    }
  });

  it('should reject sections that are not objects', async () => {
    const configPath = path.join(tempDir, 'config.json');

    await fs.writeFile(configPath, JSON.stringify({ scan: null }));
    await expect(loadConfig(configPath)).rejects.toThrow('Configuration error: scan must be an object');

    await fs.writeFile(configPath, JSON.stringify({ output: 'out' }));
    await expect(loadConfig(configPath)).rejects.toThrow('Configuration error: output must be an object');

    await fs.writeFile(configPath, JSON.stringify({ report: [5] }));
    await expect(loadConfig(configPath)).rejects.toThrow('Configuration error: report must be an object');
  });

  it('should validate the output directory', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ output: { directory: 5 } }));

    await expect(loadConfig(configPath)).rejects.toThrow(
      'Configuration error: output directory must be a string or null'
    );
  });

  it('should validate boolean settings', async () => {
    const configPath = path.join(tempDir, 'config.json');

    await fs.writeFile(configPath, JSON.stringify({ scan: { includeHidden: 'yes' } }));
    await expect(loadConfig(configPath)).rejects.toThrow('Configuration error: includeHidden must be a boolean');

    await fs.writeFile(configPath, JSON.stringify({ scan: { followSymlinks: 0 } }));
    await expect(loadConfig(configPath)).rejects.toThrow('Configuration error: followSymlinks must be a boolean');

    await fs.writeFile(configPath, JSON.stringify({ report: { verbose: null } }));
    await expect(loadConfig(configPath)).rejects.toThrow('Configuration error: verbose must be a boolean');
  });

  it('should validate the package extension type', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ packageExtension: 7 }));

    await expect(loadConfig(configPath)).rejects.toThrow('packageExtension must start with "."');
  });

  it('should validate the package extension', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ packageExtension: 'eb' }));

    await expect(loadConfig(configPath)).rejects.toThrow('packageExtension must start with "."');
  });

  it('should validate the example count', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify({ report: { examples: -1 } }));

    await expect(loadConfig(configPath)).rejects.toThrow('examples must be a non-negative integer');
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig(mergeConfig())).not.toThrow();
  });

  it('should reject empty output file names', () => {
    const config = mergeConfig({ output: { filesWithoutManifest: ' ' } });

    expect(() => validateConfig(config)).toThrow('output file names must be non-empty');
  });

  it('should reject identical output file names', () => {
    const config = mergeConfig({ output: { manifestWithoutFiles: 'ext_eb_repo.txt' } });

    expect(() => validateConfig(config)).toThrow('output file names must differ');
  });

  it('should reject fractional example counts', () => {
    const config = mergeConfig({ report: { examples: 2.5 } });

    expect(() => validateConfig(config)).toThrow('examples must be a non-negative integer');
  });
});

describe('parseExampleCount', () => {
  it('should parse non-negative integers', () => {
    expect(parseExampleCount('0')).toBe(0);
    expect(parseExampleCount('12')).toBe(12);
  });

  it('should reject anything else', () => {
    expect(() => parseExampleCount('-1')).toThrow('Expected a non-negative integer, got "-1"');
    expect(() => parseExampleCount('2.5')).toThrow('Expected a non-negative integer');
    expect(() => parseExampleCount('five')).toThrow('Expected a non-negative integer');
  });
});
