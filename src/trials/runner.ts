/**
 * Trial Runner
 * Measures every registered tool against one staged scenario, one tool
 * at a time. A failing tool is recorded on its own TrialResult and never
 * stops the others. A CacheStagingError from re-staging between tools is
 * not a tool failure: it ends the scenario and propagates.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TestScenario, TrialResult } from '../types.js';
import { ToolInvocationFailure, errorMessage } from '../errors.js';
import { StagedInput, PrepareStep } from '../cache/controller.js';
import { ToolAdapter } from '../tools/adapter.js';
import { ToolRegistry } from '../tools/registry.js';
import { fileDigest } from '../utils/hash.js';
import { andThen, shellQuote } from '../utils/shell.js';
import { RunCount, TimingEngine } from './timing-engine.js';

// Exit status recorded when the engine produced no measurement at all
export const NO_MEASUREMENT_EXIT_STATUS = -1;

export interface TrialRunnerOptions {
  engine: TimingEngine;
  warmup: number;
  minRuns: number;
  /** Fixed run count for cold and really-cold scenarios */
  coldRuns: number;
  /** Scratch directories tools may create, relative to workDir */
  scratchDirs: string[];
  workDir?: string;
  timeoutMs?: number;
  verbose?: boolean;
}

export interface RunPlan {
  warmup: number;
  runs: RunCount;
}

/**
 * Render a prepare step as shell, silencing its stdout
 */
export function renderPrepareStep(step: PrepareStep): string {
  return `${step.argv.map(shellQuote).join(' ')} >/dev/null`;
}

export class TrialRunner {
  private registry: ToolRegistry;
  private options: TrialRunnerOptions;
  private workDir: string;

  constructor(registry: ToolRegistry, options: TrialRunnerOptions) {
    this.registry = registry;
    this.options = options;
    this.workDir = options.workDir ?? process.cwd();
  }

  /**
   * Hot scenarios use the configured counts; staging cost is paid per run
   * for the others, so they get a small fixed count and no warmup
   */
  runPlan(scenario: TestScenario): RunPlan {
    if (scenario.cacheState === 'hot') {
      return {
        warmup: this.options.warmup,
        runs: { kind: 'min', runs: this.options.minRuns },
      };
    }
    return {
      warmup: 0,
      runs: { kind: 'exact', runs: this.options.coldRuns },
    };
  }

  cleanScratchCommand(): string {
    if (this.options.scratchDirs.length === 0) return '';
    return `rm -rf ${this.options.scratchDirs.map(shellQuote).join(' ')}`;
  }

  prepareCommand(staged: StagedInput): string {
    return andThen([
      this.cleanScratchCommand(),
      ...staged.prepareEachRun.map(renderPrepareStep),
    ]);
  }

  /**
   * Measure every tool against the staged input. outputsDir must exist.
   */
  async runScenario(staged: StagedInput, outputsDir: string): Promise<TrialResult[]> {
    const { scenario } = staged;
    const plan = this.runPlan(scenario);
    const exportDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fastq-bench-export-'));
    const results: TrialResult[] = [];

    const runsText = plan.runs.kind === 'min'
      ? `${plan.warmup} warmup runs and minimum ${plan.runs.runs} runs`
      : `${plan.runs.runs} runs`;
    console.log(`Running ${this.registry.size} tools with ${runsText} on ${staged.path}`);

    try {
      for (const tool of this.registry.list()) {
        this.removeScratchDirs();
        results.push(await this.runTool(tool, staged, plan, outputsDir, exportDir));
      }
    } finally {
      this.removeScratchDirs();
      fs.rmSync(exportDir, { recursive: true, force: true });
    }

    return results;
  }

  private async runTool(
    tool: ToolAdapter,
    staged: StagedInput,
    plan: RunPlan,
    outputsDir: string,
    exportDir: string
  ): Promise<TrialResult> {
    const outputPath = path.join(outputsDir, `${tool.id}.txt`);
    const base = {
      scenario: staged.scenario,
      toolId: tool.id,
      outputPath,
    };

    if (this.options.verbose) {
      console.log(`  ${tool.id}: output --> ${outputPath}`);
    }

    await staged.beforeTool();

    try {
      const measurement = await this.options.engine.measure({
        name: tool.id,
        command: tool.shellCommand(staged.path, outputPath),
        warmup: plan.warmup,
        runs: plan.runs,
        prepare: this.prepareCommand(staged),
        conclude: this.cleanScratchCommand(),
        exportJsonPath: path.join(exportDir, `${tool.id}.json`),
        env: tool.env,
        cwd: this.workDir,
        timeoutMs: this.options.timeoutMs,
      });

      const exitStatus = measurement.exitCodes.find(code => code !== 0) ?? 0;
      const result: TrialResult = {
        ...base,
        statistics: measurement.statistics,
        exitStatus,
        exitCodes: measurement.exitCodes,
        outputDigest: await fileDigest(outputPath),
      };

      if (exitStatus !== 0) {
        const failure = new ToolInvocationFailure(tool.id, exitStatus);
        result.error = failure.message;
        console.warn(`  ✗ ${failure.message} (see ${outputPath})`);
      } else {
        console.log(`  ✓ ${tool.id}: ${(measurement.statistics.mean * 1000).toFixed(1)} ms ± ${(measurement.statistics.stddev * 1000).toFixed(1)} ms`);
      }
      return result;
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`  ✗ ${tool.id}: ${message}`);
      return {
        ...base,
        statistics: null,
        exitStatus: NO_MEASUREMENT_EXIT_STATUS,
        exitCodes: [],
        outputDigest: await fileDigest(outputPath),
        error: message,
      };
    }
  }

  private removeScratchDirs(): void {
    for (const dir of this.options.scratchDirs) {
      fs.rmSync(path.resolve(this.workDir, dir), { recursive: true, force: true });
    }
  }
}
