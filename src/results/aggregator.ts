/**
 * Result Aggregator
 * Owns the timestamped result tree for one run. Write failures are not
 * retried: they surface as PersistenceFailure and end the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  CacheStatus,
  FORMAT_TAGS,
  RunSummary,
  TestScenario,
  TrialResult,
} from '../types.js';
import { PersistenceFailure, errorMessage } from '../errors.js';
import { EnvironmentSnapshot } from './environment.js';
import { formatCacheStatus, formatRunSummary, formatScenarioMarkdown } from './report.js';

export interface ScenarioMeta {
  engine: string;
  engineVersion: string | null;
  warmup: number;
  runs: number;
  runsKind: 'min' | 'exact';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time directory name, e.g. benchmark_20240131_094512
 */
export function runDirectoryName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `benchmark_${day}_${time}`;
}

export class ResultAggregator {
  readonly runDir: string;

  constructor(resultsDir: string, startedAt: Date = new Date()) {
    this.runDir = path.join(resultsDir, runDirectoryName(startedAt));
  }

  /**
   * Create the run directory
   */
  init(): void {
    this.ensureDir(this.runDir);
  }

  scenarioStem(scenario: TestScenario): string {
    return path.join(this.runDir, scenario.size, `${scenario.cacheState}_${FORMAT_TAGS[scenario.format]}`);
  }

  outputsDir(scenario: TestScenario): string {
    return `${this.scenarioStem(scenario)}_outputs`;
  }

  /**
   * Create the directory tools write their output into for a scenario
   */
  prepareOutputsDir(scenario: TestScenario): string {
    const dir = this.outputsDir(scenario);
    this.ensureDir(dir);
    return dir;
  }

  writeEnvironment(snapshot: EnvironmentSnapshot): string {
    const file = path.join(this.runDir, 'system_info.json');
    this.write(file, JSON.stringify(snapshot, null, 2) + '\n');
    return file;
  }

  /**
   * Statistics (JSON and markdown) plus, for cold states, the cache-status sidecar
   */
  writeScenario(
    scenario: TestScenario,
    status: CacheStatus,
    results: TrialResult[],
    meta: ScenarioMeta
  ): string[] {
    const stem = this.scenarioStem(scenario);
    const sizeDir = path.dirname(stem);
    this.ensureDir(sizeDir);

    const document = {
      scenario: {
        size: scenario.size,
        format: scenario.format,
        cacheState: scenario.cacheState,
        key: scenario.key,
      },
      cache: {
        method: status.method,
        outcome: status.outcome,
        timestamp: status.timestamp.toISOString(),
        originalFile: status.originalFile,
        stagedFile: status.stagedFile,
      },
      engine: {
        name: meta.engine,
        version: meta.engineVersion,
        warmup: meta.warmup,
        runs: meta.runs,
        runsKind: meta.runsKind,
      },
      results: results.map(r => ({
        tool: r.toolId,
        mean: r.statistics?.mean ?? null,
        stddev: r.statistics?.stddev ?? null,
        median: r.statistics?.median ?? null,
        min: r.statistics?.min ?? null,
        max: r.statistics?.max ?? null,
        samples: r.statistics?.samples ?? 0,
        times: r.statistics?.times ?? [],
        exitStatus: r.exitStatus,
        exitCodes: r.exitCodes,
        output: path.relative(sizeDir, r.outputPath),
        outputDigest: r.outputDigest,
        ...(r.error ? { error: r.error } : {}),
      })),
    };

    const written = [`${stem}.json`, `${stem}.md`];
    this.write(written[0], JSON.stringify(document, null, 2) + '\n');
    this.write(written[1], formatScenarioMarkdown(scenario, status, results));

    if (scenario.cacheState !== 'hot') {
      const sidecar = `${stem}_cache_status.txt`;
      this.write(sidecar, formatCacheStatus(status));
      written.push(sidecar);
    }

    return written;
  }

  writeRunSummary(summary: RunSummary): string {
    const file = path.join(this.runDir, 'SUMMARY.txt');
    this.write(file, formatRunSummary(summary));
    this.write(path.join(this.runDir, 'summary.json'), JSON.stringify(summary, null, 2) + '\n');
    return file;
  }

  /**
   * Every entry under the run directory, relative, directories suffixed with "/"
   */
  listTree(): string[] {
    const entries: string[] = [];
    const walk = (dir: string): void => {
      const children = fs.readdirSync(dir, { withFileTypes: true })
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const child of children) {
        const full = path.join(dir, child.name);
        const relative = path.relative(this.runDir, full);
        if (child.isDirectory()) {
          entries.push(`${relative}/`);
          walk(full);
        } else {
          entries.push(relative);
        }
      }
    };

    if (fs.existsSync(this.runDir)) {
      walk(this.runDir);
    }
    return entries;
  }

  private ensureDir(dir: string): void {
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new PersistenceFailure(dir, errorMessage(error));
    }
  }

  private write(file: string, content: string): void {
    try {
      fs.writeFileSync(file, content);
    } catch (error) {
      throw new PersistenceFailure(file, errorMessage(error));
    }
  }
}
