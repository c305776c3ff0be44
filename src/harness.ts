/**
 * BenchmarkHarness - runs the whole scenario matrix
 * Discovery and matrix construction once, then stage → measure → persist
 * → release for each scenario, strictly one after another.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  BenchConfig,
  CacheState,
  CACHE_STATES,
  InputFileSize,
  InputFormat,
  INPUT_FORMATS,
  RunSummary,
  ScenarioRecord,
  StagingFailureRecord,
  TestScenario,
} from './types.js';
import { CacheStagingError, SetupError } from './errors.js';
import { validateConfig } from './utils/config.js';
import { discoverTools, ToolRegistry } from './tools/registry.js';
import { BBToolsDataGenerator, DataGenerator } from './generation/generator.js';
import { inputFilePath } from './generation/files.js';
import { buildTestMatrix, TestMatrix } from './matrix/builder.js';
import { CacheStateController, StagedInput } from './cache/controller.js';
import { CacheEvictor, VmtouchEvictor } from './cache/evictor.js';
import { HyperfineEngine, TimingEngine } from './trials/timing-engine.js';
import { TrialRunner } from './trials/runner.js';
import { ResultAggregator } from './results/aggregator.js';
import { captureEnvironment } from './results/environment.js';
import { scenarioTitle } from './results/report.js';

/**
 * Collaborators a harness can be given instead of the real ones
 */
export interface HarnessDependencies {
  registry?: ToolRegistry;
  generator?: DataGenerator;
  evictor?: CacheEvictor;
  engine?: TimingEngine;
  now?: () => Date;
}

export interface HarnessOutcome {
  runDir: string;
  summary: RunSummary;
}

export function enabledFormats(config: Pick<BenchConfig, 'skipCompression'>): InputFormat[] {
  return INPUT_FORMATS.filter(f => !(config.skipCompression && f === 'bgzip'));
}

export function enabledCacheStates(
  config: Pick<BenchConfig, 'skipCold' | 'reallyCold'>
): CacheState[] {
  return CACHE_STATES.filter(state => {
    if (state === 'hot') return true;
    if (config.skipCold) return false;
    return state === 'cold' || config.reallyCold;
  });
}

/**
 * Environment every tool and generator script runs with.
 * Wrappers written for the older shell harness read BIOFASTER_ROOT, so the
 * root is exported under both names. A JRE bundled at <root>/jre takes
 * precedence over the system Java.
 */
export function toolEnvironment(config: BenchConfig, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...base,
    FASTQ_BENCH_ROOT: config.projectRoot,
    BIOFASTER_ROOT: config.projectRoot,
    BBTOOLS_PATH: base.BBTOOLS_PATH ?? path.join(config.bbtoolsDir, 'current') + path.sep,
  };

  const jre = path.join(config.projectRoot, 'jre');
  if (fs.existsSync(jre)) {
    env.JAVA_HOME = jre;
    env.PATH = base.PATH ? `${path.join(jre, 'bin')}${path.delimiter}${base.PATH}` : path.join(jre, 'bin');
  }
  return env;
}

export class BenchmarkHarness {
  private config: BenchConfig;
  private deps: HarnessDependencies;
  private current: StagedInput | null = null;

  constructor(config: BenchConfig, deps: HarnessDependencies = {}) {
    this.config = config;
    this.deps = deps;
  }

  /**
   * Run every scenario and write the result tree
   */
  async run(): Promise<HarnessOutcome> {
    const { config } = this;
    const now = this.deps.now ?? (() => new Date());
    const startedAt = now();

    const validation = validateConfig(config);
    if (!validation.valid) {
      throw new SetupError(
        `Invalid configuration: ${validation.errors.join('; ')}`,
        'INVALID_ARGUMENT',
        { errors: validation.errors }
      );
    }

    const env = toolEnvironment(config);
    const timeoutMs = config.timeoutSeconds * 1000;

    console.log('');
    console.log('Discovering available tools...');
    const registry = this.deps.registry ?? discoverTools(config.toolsDir, { env });
    for (const id of registry.ids()) {
      console.log(`  Found: ${id}`);
    }
    console.log(`Total tools available: ${registry.size}`);

    const generator = this.deps.generator ?? new BBToolsDataGenerator({
      bbtoolsDir: config.bbtoolsDir,
      timeoutMs,
      env,
    });
    const evictor = this.deps.evictor ?? new VmtouchEvictor('vmtouch', env);
    const engine = this.deps.engine ?? new HyperfineEngine();

    const formats = enabledFormats(config);
    const cacheStates = enabledCacheStates(config);
    const matrix = await buildTestMatrix({
      dataDir: config.dataDir,
      sizes: config.sizes,
      formats,
      cacheStates,
      generator,
    });

    if (matrix.scenarios.length === 0) {
      throw new SetupError(
        'No scenarios remain to benchmark',
        'NO_SCENARIOS',
        { generationFailures: matrix.generationFailures }
      );
    }

    const aggregator = new ResultAggregator(config.resultsDir, startedAt);
    aggregator.init();

    console.log('Capturing system information...');
    const snapshot = await captureEnvironment({ projectRoot: config.projectRoot, engine, evictor });
    aggregator.writeEnvironment(snapshot);
    const engineVersion = snapshot.timingEngineVersion === 'N/A' ? null : snapshot.timingEngineVersion;

    console.log('');
    console.log('==========================================');
    console.log('FASTQ Parser Benchmark');
    console.log('==========================================');
    console.log(`Test sizes to benchmark: ${matrix.sizes.join(' ')}`);
    console.log(`Scenarios: ${matrix.scenarios.length}`);
    console.log(`Warmup runs: ${config.warmup}`);
    console.log(`Min benchmark runs: ${config.minRuns}`);
    console.log(`Results directory: ${aggregator.runDir}`);
    console.log('==========================================');

    const controller = new CacheStateController({
      dataDir: config.dataDir,
      ramPath: config.ramPath,
      evictor,
      generator,
    });
    const runner = new TrialRunner(registry, {
      engine,
      warmup: config.warmup,
      minRuns: config.minRuns,
      coldRuns: config.coldRuns,
      scratchDirs: config.scratchDirs,
      workDir: config.projectRoot,
      timeoutMs,
      verbose: config.verbose,
    });

    const records: ScenarioRecord[] = [];
    const stagingFailures: StagingFailureRecord[] = [];

    for (const scenario of matrix.scenarios) {
      console.log('');
      console.log('==========================================');
      console.log(scenarioTitle(scenario));
      console.log('==========================================');

      let staged: StagedInput;
      try {
        staged = await controller.stage(scenario);
      } catch (error) {
        if (!(error instanceof CacheStagingError)) throw error;
        this.skipScenario(stagingFailures, scenario, error);
        continue;
      }

      this.current = staged;
      try {
        const outputsDir = aggregator.prepareOutputsDir(scenario);
        const results = await runner.runScenario(staged, outputsDir);
        const plan = runner.runPlan(scenario);
        aggregator.writeScenario(scenario, staged.status, results, {
          engine: engine.name,
          engineVersion,
          warmup: plan.warmup,
          runs: plan.runs.runs,
          runsKind: plan.runs.kind,
        });

        records.push({
          scenario,
          method: staged.status.method,
          degraded: staged.status.outcome.kind === 'degraded',
          results: results.map(r => ({
            toolId: r.toolId,
            exitStatus: r.exitStatus,
            mean: r.statistics?.mean ?? null,
          })),
        });
        console.log(`Cache method: ${staged.status.method}`);
      } catch (error) {
        // Re-staging between tools failed
        if (!(error instanceof CacheStagingError)) throw error;
        this.skipScenario(stagingFailures, scenario, error);
      } finally {
        this.current = null;
        await staged.release();
      }
    }

    const summary: RunSummary = {
      runId: uuidv4(),
      startedAt,
      finishedAt: now(),
      host: os.hostname(),
      sizes: matrix.sizes,
      formats,
      cacheStates,
      warmup: config.warmup,
      minRuns: config.minRuns,
      coldRuns: config.coldRuns,
      tools: registry.ids(),
      scenarios: records,
      generationFailures: matrix.generationFailures,
      stagingFailures,
      inputFiles: this.inputFileSizes(matrix, formats),
      resultTree: aggregator.listTree(),
    };
    aggregator.writeRunSummary(summary);

    console.log('');
    console.log('==========================================');
    console.log('Benchmark Complete!');
    console.log('==========================================');
    console.log(`All results saved to: ${aggregator.runDir}`);

    return { runDir: aggregator.runDir, summary };
  }

  /**
   * Release whatever scenario is staged right now (used on interrupt)
   */
  async releaseCurrent(): Promise<void> {
    const staged = this.current;
    this.current = null;
    if (staged) {
      await staged.release();
    }
  }

  private skipScenario(
    failures: StagingFailureRecord[],
    scenario: TestScenario,
    error: CacheStagingError
  ): void {
    console.warn(`⚠ ${error.message} - skipping scenario`);
    failures.push({ scenario, reason: error.message });
  }

  private inputFileSizes(matrix: TestMatrix, formats: InputFormat[]): InputFileSize[] {
    const files: InputFileSize[] = [];
    for (const size of matrix.sizes) {
      for (const format of formats) {
        const file = inputFilePath(this.config.dataDir, size, format);
        files.push({
          size,
          format,
          path: file,
          bytes: fs.existsSync(file) ? fs.statSync(file).size : null,
        });
      }
    }
    return files;
  }
}
