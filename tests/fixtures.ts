/**
 * In-process stand-ins shared by the test suites
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GenerationFailure } from '../src/errors';
import { DataGenerator, GenerateRequest, GeneratedFiles, CANONICAL_SEED } from '../src/generation/generator';
import { inputFilePath } from '../src/generation/files';
import { CacheEvictor } from '../src/cache/evictor';
import { Measurement, MeasurementRequest, TimingEngine } from '../src/trials/timing-engine';
import { TimingStatistics } from '../src/types';
import { runCommand } from '../src/utils/process';

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `fastq-bench-${prefix}-`));
}

/**
 * Write a /bin/sh script and make it executable
 */
export function writeExecutable(dir: string, name: string, body: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, name);
  fs.writeFileSync(file, `#!/bin/sh\n${body}\n`);
  fs.chmodSync(file, 0o755);
  return file;
}

/**
 * Four-line FASTQ record whose header names the size, format and seed
 */
export function fakeFastq(size: string, format: string, seed: number): string {
  return `@${size}:${format}:${seed}\nACGTACGT\n+\nIIIIIIII\n`;
}

export class FakeGenerator implements DataGenerator {
  readonly calls: GenerateRequest[] = [];
  readonly failSizes = new Set<string>();
  /** 1-based call numbers that fail whatever the size */
  readonly failCalls = new Set<number>();

  async generate(request: GenerateRequest): Promise<GeneratedFiles> {
    this.calls.push(request);
    if (this.failSizes.has(request.size) || this.failCalls.has(this.calls.length)) {
      throw new GenerationFailure(request.size, 'randomreads.sh exited with status 1');
    }

    const seed = request.seed ?? CANONICAL_SEED;
    fs.mkdirSync(request.outputDir, { recursive: true });
    const files: GeneratedFiles = {};
    for (const format of request.formats) {
      const file = inputFilePath(request.outputDir, request.size, format);
      fs.writeFileSync(file, fakeFastq(request.size, format, seed));
      files[format] = file;
    }
    return files;
  }
}

export class FakeEvictor implements CacheEvictor {
  readonly name = 'fake-evict';
  readonly evicted: string[] = [];
  private available: boolean;
  private failure: string | null;

  constructor(available: boolean = true, failure: string | null = null) {
    this.available = available;
    this.failure = failure;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async evict(filePath: string): Promise<void> {
    if (this.failure) {
      throw new Error(this.failure);
    }
    this.evicted.push(filePath);
  }

  evictArgv(filePath: string): string[] {
    return ['true', filePath];
  }
}

export function summarize(times: number[]): TimingStatistics {
  const sorted = [...times].sort((a, b) => a - b);
  const n = times.length;
  const mean = n > 0 ? times.reduce((sum, t) => sum + t, 0) / n : 0;
  const variance = n > 1 ? times.reduce((sum, t) => sum + (t - mean) ** 2, 0) / (n - 1) : 0;
  const mid = Math.floor(n / 2);
  const median = n === 0 ? 0 : n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  return {
    mean,
    stddev: Math.sqrt(variance),
    median,
    min: n > 0 ? sorted[0] : 0,
    max: n > 0 ? sorted[n - 1] : 0,
    samples: n,
    times,
  };
}

/**
 * Timing engine that runs each request through /bin/sh the way hyperfine
 * would: prepare, command, conclude, once per warmup and measured run
 */
export class ShellEngine implements TimingEngine {
  readonly name = 'shell';
  readonly requests: MeasurementRequest[] = [];

  async version(): Promise<string | null> {
    return '1.0-test';
  }

  async measure(request: MeasurementRequest): Promise<Measurement> {
    this.requests.push(request);
    const options = { cwd: request.cwd, env: request.env };
    const times: number[] = [];
    const exitCodes: number[] = [];

    for (let i = 0; i < request.warmup + request.runs.runs; i++) {
      if (request.prepare) {
        await runCommand('sh', ['-c', request.prepare], options);
      }
      const result = await runCommand('sh', ['-c', request.command], options);
      if (request.conclude) {
        await runCommand('sh', ['-c', request.conclude], options);
      }
      if (i >= request.warmup) {
        times.push(result.durationMs / 1000);
        exitCodes.push(result.exitCode);
      }
    }

    return { statistics: summarize(times), exitCodes };
  }
}

/**
 * Timing engine with canned answers per tool name
 */
export class ScriptedEngine implements TimingEngine {
  readonly name = 'scripted';
  readonly requests: MeasurementRequest[] = [];
  readonly exitCodes = new Map<string, number[]>();
  readonly failures = new Map<string, Error>();
  readonly means = new Map<string, number>();

  async version(): Promise<string | null> {
    return null;
  }

  async measure(request: MeasurementRequest): Promise<Measurement> {
    this.requests.push(request);
    const failure = this.failures.get(request.name);
    if (failure) {
      throw failure;
    }

    const runs = request.runs.runs;
    const mean = this.means.get(request.name) ?? 0.1;
    const times = Array.from({ length: runs }, () => mean);
    return {
      statistics: summarize(times),
      exitCodes: this.exitCodes.get(request.name) ?? Array.from({ length: runs }, () => 0),
    };
  }
}
