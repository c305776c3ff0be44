/**
 * Cache State Controller
 * Stages a scenario's input into a hot, cold or really-cold state.
 *
 * Falling back from kernel eviction to a RAM copy is an expected outcome,
 * recorded on the CacheStatus. Only failing to produce any usable file
 * raises CacheStagingError.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomInt } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import {
  CacheMethod,
  CacheOutcome,
  CacheStatus,
  FORMAT_TAGS,
  TestScenario,
} from '../types.js';
import { CacheStagingError, errorMessage } from '../errors.js';
import { DataGenerator } from '../generation/generator.js';
import { inputFilePath } from '../generation/files.js';
import { CacheEvictor } from './evictor.js';

/**
 * Work the timing engine repeats before every measured run
 */
export interface PrepareStep {
  kind: 'evict' | 'copy';
  argv: string[];
}

export interface StagedInput {
  readonly scenario: TestScenario;
  /** The path every tool is handed */
  readonly path: string;
  readonly status: CacheStatus;
  readonly prepareEachRun: readonly PrepareStep[];
  /** Called before each tool's trial */
  beforeTool(): Promise<void>;
  /** Deletes every staged artifact; safe to call more than once */
  release(): Promise<void>;
}

export interface CacheControllerOptions {
  dataDir: string;
  ramPath: string;
  evictor: CacheEvictor;
  generator: DataGenerator;
  /** Parent of really-cold regeneration directories (default: <dataDir>/really-cold) */
  regenerationRoot?: string;
}

function makeStatus(
  scenario: TestScenario,
  outcome: CacheOutcome,
  originalFile: string,
  stagedFile: string
): CacheStatus {
  return {
    scenario,
    method: outcome.method,
    outcome,
    timestamp: new Date(),
    originalFile,
    stagedFile,
  };
}

function freshSeed(): number {
  return randomInt(1, 2 ** 31 - 1);
}

export class CacheStateController {
  private dataDir: string;
  private ramPath: string;
  private evictor: CacheEvictor;
  private generator: DataGenerator;
  private regenerationRoot: string;

  constructor(options: CacheControllerOptions) {
    this.dataDir = options.dataDir;
    this.ramPath = options.ramPath;
    this.evictor = options.evictor;
    this.generator = options.generator;
    this.regenerationRoot = options.regenerationRoot ?? path.join(options.dataDir, 'really-cold');
  }

  /**
   * Prepare the scenario's input file
   */
  async stage(scenario: TestScenario): Promise<StagedInput> {
    switch (scenario.cacheState) {
      case 'hot':
        return this.stageHot(scenario);
      case 'cold':
        return this.stageCold(scenario);
      case 'really-cold':
        return this.stageReallyCold(scenario);
    }
  }

  /**
   * Name for a copy in fast storage, unique to the scenario and the staging
   */
  stagedCopyPath(scenario: TestScenario, source: string): string {
    const tag = FORMAT_TAGS[scenario.format];
    return path.join(
      this.ramPath,
      `${scenario.cacheState}_${scenario.size}_${tag}_${uuidv4()}_${path.basename(source)}`
    );
  }

  canonicalPath(scenario: TestScenario): string {
    return inputFilePath(this.dataDir, scenario.size, scenario.format);
  }

  private async stageHot(scenario: TestScenario): Promise<StagedInput> {
    const source = this.canonicalPath(scenario);
    const copy = await this.copyToFastStorage(scenario, source);
    const outcome: CacheOutcome = { kind: 'achieved', method: 'ram-copy' };
    return this.stagedCopy(scenario, makeStatus(scenario, outcome, source, copy), []);
  }

  private async stageCold(scenario: TestScenario): Promise<StagedInput> {
    const source = this.canonicalPath(scenario);
    if (!fs.existsSync(source)) {
      throw new CacheStagingError(scenario.key, `input file missing: ${source}`);
    }

    let reason: string;
    if (await this.evictor.isAvailable()) {
      try {
        await this.evictor.evict(source);
        const outcome: CacheOutcome = { kind: 'achieved', method: 'kernel-eviction' };
        console.log(`✓ ${this.evictor.name} available - pages will be evicted before each run`);
        return {
          scenario,
          path: source,
          status: makeStatus(scenario, outcome, source, source),
          prepareEachRun: [{ kind: 'evict', argv: this.evictor.evictArgv(source) }],
          beforeTool: async () => {},
          release: async () => {},
        };
      } catch (error) {
        reason = `${this.evictor.name} failed: ${errorMessage(error)}`;
      }
    } else {
      reason = `${this.evictor.name} not available`;
    }

    console.warn(`⚠ ${reason} - falling back to RAM copy method`);
    const copy = await this.copyToFastStorage(scenario, source);
    const outcome: CacheOutcome = { kind: 'degraded', method: 'ram-copy-fallback', reason };
    console.log(`  File will be copied to RAM before each run: ${copy}`);
    return this.stagedCopy(
      scenario,
      makeStatus(scenario, outcome, source, copy),
      [{ kind: 'copy', argv: ['cp', source, copy] }]
    );
  }

  private async stageReallyCold(scenario: TestScenario): Promise<StagedInput> {
    const tag = FORMAT_TAGS[scenario.format];
    const dir = path.join(this.regenerationRoot, `${scenario.size}_${tag}_${uuidv4()}`);
    const target = inputFilePath(dir, scenario.size, scenario.format);

    const regenerate = async (): Promise<void> => {
      fs.rmSync(dir, { recursive: true, force: true });
      try {
        const files = await this.generator.generate({
          size: scenario.size,
          formats: [scenario.format],
          outputDir: dir,
          seed: freshSeed(),
        });
        if (files[scenario.format] !== target || !fs.existsSync(target)) {
          throw new Error(`generator did not produce ${target}`);
        }
      } catch (error) {
        fs.rmSync(dir, { recursive: true, force: true });
        throw new CacheStagingError(scenario.key, `regeneration failed: ${errorMessage(error)}`);
      }
    };

    console.log(`Regenerating ${scenario.size} (${scenario.format}) from scratch in ${dir}`);
    await regenerate();

    const method: CacheMethod = 'fresh-regeneration';
    let consumed = false;
    let released = false;

    return {
      scenario,
      path: target,
      status: makeStatus(scenario, { kind: 'achieved', method }, this.canonicalPath(scenario), target),
      prepareEachRun: [],
      // Every tool after the first gets a file no other tool has read
      beforeTool: async () => {
        if (consumed) {
          await regenerate();
        }
        consumed = true;
      },
      release: async () => {
        if (released) return;
        released = true;
        fs.rmSync(dir, { recursive: true, force: true });
      },
    };
  }

  private stagedCopy(
    scenario: TestScenario,
    status: CacheStatus,
    prepareEachRun: PrepareStep[]
  ): StagedInput {
    let released = false;
    return {
      scenario,
      path: status.stagedFile,
      status,
      prepareEachRun,
      beforeTool: async () => {},
      release: async () => {
        if (released) return;
        released = true;
        fs.rmSync(status.stagedFile, { force: true });
      },
    };
  }

  private async copyToFastStorage(scenario: TestScenario, source: string): Promise<string> {
    const destination = this.stagedCopyPath(scenario, source);
    try {
      await fs.promises.mkdir(this.ramPath, { recursive: true });
      await fs.promises.copyFile(source, destination);

      const [sourceStat, copyStat] = await Promise.all([
        fs.promises.stat(source),
        fs.promises.stat(destination),
      ]);
      if (sourceStat.size !== copyStat.size) {
        throw new Error(`short copy (${copyStat.size} of ${sourceStat.size} bytes)`);
      }
    } catch (error) {
      if (fs.existsSync(destination)) {
        await fs.promises.rm(destination, { force: true });
      }
      throw new CacheStagingError(
        scenario.key,
        `copy to ${this.ramPath} failed: ${errorMessage(error)}`
      );
    }
    return destination;
  }
}
