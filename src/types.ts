/**
 * FASTQ Bench Type Definitions
 * Scenario matrix, cache staging and trial result model
 */

// Input formats, in matrix order
export const INPUT_FORMATS = ['raw', 'gzip', 'bgzip'] as const;
export type InputFormat = (typeof INPUT_FORMATS)[number];

// Cache states, in matrix order
export const CACHE_STATES = ['hot', 'cold', 'really-cold'] as const;
export type CacheState = (typeof CACHE_STATES)[number];

// Short format tags used in result file names
export const FORMAT_TAGS: Record<InputFormat, string> = {
  raw: 'raw',
  gzip: 'gz',
  bgzip: 'bgz',
};

export type CacheMethod =
  | 'ram-copy'            // Hot: copied once into fast storage
  | 'kernel-eviction'     // Cold: pages evicted through vmtouch
  | 'ram-copy-fallback'   // Cold: eviction unavailable, re-copied per run
  | 'fresh-regeneration'; // Really-cold: regenerated before each tool

/**
 * A benchmark subject discovered in the tools directory
 */
export interface ToolDescriptor {
  readonly id: string;
  readonly path: string;
}

/**
 * One (size, format, cache-state) combination
 */
export interface TestScenario {
  readonly size: string;
  readonly format: InputFormat;
  readonly cacheState: CacheState;
  readonly key: string;    // e.g. "1m/cold_gz"
}

/**
 * Result of a staging strategy: either it did what was asked,
 * or it fell back and says why
 */
export type CacheOutcome =
  | { kind: 'achieved'; method: CacheMethod }
  | { kind: 'degraded'; method: CacheMethod; reason: string };

export interface CacheStatus {
  scenario: TestScenario;
  method: CacheMethod;
  outcome: CacheOutcome;
  timestamp: Date;
  originalFile: string;
  stagedFile: string;
}

/**
 * Wall-clock statistics for one tool, in seconds
 */
export interface TimingStatistics {
  mean: number;
  stddev: number;
  median: number;
  min: number;
  max: number;
  samples: number;
  times: number[];
}

export interface TrialResult {
  scenario: TestScenario;
  toolId: string;
  statistics: TimingStatistics | null;
  exitStatus: number;
  exitCodes: number[];
  outputPath: string;
  outputDigest: string | null;   // sha256 of the last run's captured output
  error?: string;
}

export interface GenerationFailureRecord {
  size: string;
  reason: string;
}

export interface StagingFailureRecord {
  scenario: TestScenario;
  reason: string;
}

/**
 * Completed scenario, as listed in the run summary
 */
export interface ScenarioRecord {
  scenario: TestScenario;
  method: CacheMethod;
  degraded: boolean;
  results: Array<{ toolId: string; exitStatus: number; mean: number | null }>;
}

export interface InputFileSize {
  size: string;
  format: InputFormat;
  path: string;
  bytes: number | null;
}

export interface RunSummary {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  host: string;
  sizes: string[];
  formats: InputFormat[];
  cacheStates: CacheState[];
  warmup: number;
  minRuns: number;
  coldRuns: number;
  tools: string[];
  scenarios: ScenarioRecord[];
  generationFailures: GenerationFailureRecord[];
  stagingFailures: StagingFailureRecord[];
  inputFiles: InputFileSize[];
  resultTree: string[];
}

export interface BenchConfig {
  // Paths
  projectRoot: string;
  toolsDir: string;
  dataDir: string;
  resultsDir: string;
  bbtoolsDir: string;
  ramPath: string;

  // Measurement
  warmup: number;            // Default: 1 (hot only)
  minRuns: number;           // Default: 2 (hot only)
  coldRuns: number;          // Default: 3 (cold and really-cold)
  timeoutSeconds: number;    // Per timing-engine invocation

  // Matrix
  sizes: string[];           // Empty: auto-discover from dataDir
  skipCold: boolean;
  skipCompression: boolean;  // Drops bgzip
  reallyCold: boolean;

  // Scratch directories tools may leave behind (relative to cwd)
  scratchDirs: string[];

  verbose: boolean;
}
