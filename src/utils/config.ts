/**
 * Configuration Management for FASTQ Bench
 * Defaults, then the JSON config file, then environment, then CLI overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { BenchConfig } from '../types.js';
import { SetupError } from '../errors.js';
import { isSizeLabel } from './size-label.js';

export const CONFIG_FILE_NAME = 'fastq-bench.config.json';

type PathSettings = 'projectRoot' | 'toolsDir' | 'dataDir' | 'resultsDir' | 'bbtoolsDir';

const DEFAULT_SETTINGS: Omit<BenchConfig, PathSettings> = {
  ramPath: '/tmp',
  warmup: 1,
  minRuns: 2,
  coldRuns: 3,
  timeoutSeconds: 3600,
  sizes: [],
  skipCold: false,
  skipCompression: false,
  reallyCold: false,
  scratchDirs: ['ref', 'tmp'],
  verbose: false,
};

// Shape accepted from fastq-bench.config.json; relative paths resolve against the project root
const ConfigFileSchema = z
  .object({
    toolsDir: z.string().min(1),
    dataDir: z.string().min(1),
    resultsDir: z.string().min(1),
    bbtoolsDir: z.string().min(1),
    ramPath: z.string().min(1),
    warmup: z.number().int().min(0),
    minRuns: z.number().int().min(1),
    coldRuns: z.number().int().min(1),
    timeoutSeconds: z.number().positive(),
    sizes: z.array(z.string()),
    skipCold: z.boolean(),
    skipCompression: z.boolean(),
    reallyCold: z.boolean(),
    scratchDirs: z.array(z.string().min(1)),
    verbose: z.boolean(),
  })
  .strict()
  .partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; defaults to <root>/fastq-bench.config.json when present */
  configPath?: string;
  /** Values from the command line, applied last */
  overrides?: Partial<BenchConfig>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Get the standard directory layout beneath a project root
 */
export function getProjectPaths(projectRoot: string): {
  toolsDir: string;
  dataDir: string;
  resultsDir: string;
  bbtoolsDir: string;
} {
  return {
    toolsDir: path.join(projectRoot, 'tools'),
    dataDir: path.join(projectRoot, 'test-data'),
    resultsDir: path.join(projectRoot, 'benchmark_results'),
    bbtoolsDir: path.join(projectRoot, 'BBTools'),
  };
}

/**
 * Read and validate a config file
 */
export function readConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new SetupError(
      `Failed to read config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_CONFIG',
      { filePath }
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new SetupError(
      `Invalid config in ${filePath}: ${issues.join('; ')}`,
      'INVALID_CONFIG',
      { filePath, issues }
    );
  }
  return parsed.data;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

function resolveFrom(root: string, value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return path.resolve(root, value);
}

/**
 * Load configuration from file, environment and overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): BenchConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const projectRoot = path.resolve(
    overrides.projectRoot ?? env.FASTQ_BENCH_ROOT ?? process.cwd()
  );

  const defaultPath = path.join(projectRoot, CONFIG_FILE_NAME);
  let fileConfig: ConfigFile = {};
  if (options.configPath) {
    fileConfig = readConfigFile(path.resolve(options.configPath));
  } else if (fs.existsSync(defaultPath)) {
    fileConfig = readConfigFile(defaultPath);
  }

  const derived = getProjectPaths(projectRoot);

  let config: BenchConfig = {
    ...DEFAULT_SETTINGS,
    ...derived,
    ...fileConfig,
    projectRoot,
    toolsDir: resolveFrom(projectRoot, fileConfig.toolsDir) ?? derived.toolsDir,
    dataDir: resolveFrom(projectRoot, fileConfig.dataDir) ?? derived.dataDir,
    resultsDir: resolveFrom(projectRoot, fileConfig.resultsDir) ?? derived.resultsDir,
    bbtoolsDir: resolveFrom(projectRoot, fileConfig.bbtoolsDir) ?? derived.bbtoolsDir,
  };

  // Environment
  if (env.FASTQ_BENCH_RAM_PATH) {
    config.ramPath = env.FASTQ_BENCH_RAM_PATH;
  }
  const envWarmup = envInt(env, 'FASTQ_BENCH_WARMUP');
  if (envWarmup !== undefined) config.warmup = envWarmup;
  const envRuns = envInt(env, 'FASTQ_BENCH_RUNS');
  if (envRuns !== undefined) config.minRuns = envRuns;
  const envTimeout = envInt(env, 'FASTQ_BENCH_TIMEOUT');
  if (envTimeout !== undefined) config.timeoutSeconds = envTimeout;

  // Command line wins; callers leave unset flags out of overrides
  config = { ...config, ...overrides, projectRoot };

  return config;
}

/**
 * Validate configuration
 */
export function validateConfig(config: BenchConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.warmup) || config.warmup < 0) {
    errors.push('warmup must be a non-negative integer');
  }
  if (!Number.isInteger(config.minRuns) || config.minRuns < 1) {
    errors.push('minRuns must be a positive integer');
  }
  if (!Number.isInteger(config.coldRuns) || config.coldRuns < 1) {
    errors.push('coldRuns must be a positive integer');
  }
  if (!Number.isFinite(config.timeoutSeconds) || config.timeoutSeconds <= 0) {
    errors.push('timeoutSeconds must be positive');
  }
  if (!config.ramPath) {
    errors.push('ramPath must not be empty');
  }

  for (const size of config.sizes) {
    if (!isSizeLabel(size)) {
      errors.push(`invalid size label "${size}" (expected e.g. 0.1m, 1m, 10m)`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
