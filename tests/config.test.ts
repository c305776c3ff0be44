/**
 * Tests for configuration management
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  CONFIG_FILE_NAME,
  getProjectPaths,
  loadConfig,
  readConfigFile,
  validateConfig,
} from '../src/utils/config';
import { SetupError } from '../src/errors';

describe('Configuration', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fastq-bench-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('getProjectPaths', () => {
    it('should derive the standard layout', () => {
      expect(getProjectPaths('/bench')).toEqual({
        toolsDir: '/bench/tools',
        dataDir: '/bench/test-data',
        resultsDir: '/bench/benchmark_results',
        bbtoolsDir: '/bench/BBTools',
      });
    });
  });

  describe('loadConfig', () => {
    it('should load defaults', () => {
      const config = loadConfig({ overrides: { projectRoot: testDir }, env: {} });

      expect(config.projectRoot).toBe(testDir);
      expect(config.toolsDir).toBe(path.join(testDir, 'tools'));
      expect(config.ramPath).toBe('/tmp');
      expect(config.warmup).toBe(1);
      expect(config.minRuns).toBe(2);
      expect(config.coldRuns).toBe(3);
      expect(config.timeoutSeconds).toBe(3600);
      expect(config.sizes).toEqual([]);
      expect(config.skipCold).toBe(false);
      expect(config.reallyCold).toBe(false);
      expect(config.scratchDirs).toEqual(['ref', 'tmp']);
    });

    it('should take the root from the environment', () => {
      const config = loadConfig({ env: { FASTQ_BENCH_ROOT: testDir } });
      expect(config.projectRoot).toBe(testDir);
      expect(config.dataDir).toBe(path.join(testDir, 'test-data'));
    });

    it('should merge the default config file and resolve its paths', () => {
      fs.writeFileSync(path.join(testDir, CONFIG_FILE_NAME), JSON.stringify({
        warmup: 3,
        toolsDir: 'wrappers',
        sizes: ['1m'],
      }));

      const config = loadConfig({ overrides: { projectRoot: testDir }, env: {} });

      expect(config.warmup).toBe(3);
      expect(config.toolsDir).toBe(path.join(testDir, 'wrappers'));
      expect(config.sizes).toEqual(['1m']);
      expect(config.minRuns).toBe(2); // Default
    });

    it('should let environment override the file', () => {
      fs.writeFileSync(path.join(testDir, CONFIG_FILE_NAME), JSON.stringify({ minRuns: 5 }));

      const config = loadConfig({
        overrides: { projectRoot: testDir },
        env: {
          FASTQ_BENCH_RUNS: '7',
          FASTQ_BENCH_WARMUP: '0',
          FASTQ_BENCH_RAM_PATH: '/dev/shm',
          FASTQ_BENCH_TIMEOUT: '60',
        },
      });

      expect(config.minRuns).toBe(7);
      expect(config.warmup).toBe(0);
      expect(config.ramPath).toBe('/dev/shm');
      expect(config.timeoutSeconds).toBe(60);
    });

    it('should let overrides win over everything', () => {
      const config = loadConfig({
        overrides: { projectRoot: testDir, minRuns: 4, skipCold: true },
        env: { FASTQ_BENCH_RUNS: '7' },
      });

      expect(config.minRuns).toBe(4);
      expect(config.skipCold).toBe(true);
    });

    it('should read an explicit config path', () => {
      const configPath = path.join(testDir, 'custom.json');
      fs.writeFileSync(configPath, JSON.stringify({ coldRuns: 1 }));

      const config = loadConfig({ configPath, overrides: { projectRoot: testDir }, env: {} });
      expect(config.coldRuns).toBe(1);
    });
  });

  describe('readConfigFile', () => {
    it('should reject unknown keys', () => {
      const configPath = path.join(testDir, 'bad.json');
      fs.writeFileSync(configPath, JSON.stringify({ warmupRuns: 1 }));

      expect(() => readConfigFile(configPath)).toThrow(SetupError);
    });

    it('should reject malformed JSON', () => {
      const configPath = path.join(testDir, 'broken.json');
      fs.writeFileSync(configPath, '{ not json');

      let caught: unknown;
      try {
        readConfigFile(configPath);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(SetupError);
      expect(caught).toMatchObject({ code: 'INVALID_CONFIG' });
    });

    it('should reject wrongly typed values', () => {
      const configPath = path.join(testDir, 'typed.json');
      fs.writeFileSync(configPath, JSON.stringify({ minRuns: 0 }));

      expect(() => readConfigFile(configPath)).toThrow(/minRuns/);
    });
  });

  describe('validateConfig', () => {
    it('should validate correct config', () => {
      const config = loadConfig({ overrides: { projectRoot: testDir }, env: {} });
      expect(validateConfig(config)).toEqual({ valid: true, errors: [] });
    });

    it('should report invalid values', () => {
      const config = loadConfig({
        overrides: { projectRoot: testDir, warmup: -1, sizes: ['1m', 'big'] },
        env: {},
      });
      const result = validateConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'warmup must be a non-negative integer',
        'invalid size label "big" (expected e.g. 0.1m, 1m, 10m)',
      ]);
    });

    it('should reject a non-numeric environment value', () => {
      const config = loadConfig({
        overrides: { projectRoot: testDir },
        env: { FASTQ_BENCH_RUNS: 'many' },
      });
      expect(validateConfig(config).errors).toEqual(['minRuns must be a positive integer']);
    });
  });
});
