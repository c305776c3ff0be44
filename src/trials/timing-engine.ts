/**
 * Timing Engine
 * Adapter around hyperfine, run once per (scenario, tool) and read back
 * through its JSON export.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { TimingStatistics } from '../types.js';
import { TimingEngineError, errorMessage } from '../errors.js';
import { CommandResult, commandVersion, runCommand } from '../utils/process.js';

export type RunCount =
  | { kind: 'min'; runs: number }     // engine may add runs for a stable estimate
  | { kind: 'exact'; runs: number };

export interface MeasurementRequest {
  name: string;
  command: string;
  warmup: number;
  runs: RunCount;
  /** Shell run before every warmup and measured run */
  prepare: string;
  /** Shell run after every measured run */
  conclude: string;
  exportJsonPath: string;
  env: NodeJS.ProcessEnv;
  cwd?: string;
  timeoutMs?: number;
}

export interface Measurement {
  statistics: TimingStatistics;
  exitCodes: number[];
}

export interface TimingEngine {
  readonly name: string;
  version(): Promise<string | null>;
  measure(request: MeasurementRequest): Promise<Measurement>;
}

// Exit code recorded for a run the engine reports as killed by a signal.
// Distinct from the runner's status for a tool with no measurement at all.
export const SIGNALLED_EXIT_CODE = -2;

const HyperfineResultSchema = z.object({
  command: z.string(),
  mean: z.number(),
  stddev: z.number().nullable().optional(),
  median: z.number(),
  min: z.number(),
  max: z.number(),
  times: z.array(z.number()).optional(),
  exit_codes: z.array(z.number().nullable()).optional(),
});

const HyperfineExportSchema = z.object({
  results: z.array(HyperfineResultSchema),
});

export type HyperfineResult = z.infer<typeof HyperfineResultSchema>;

/**
 * Convert one hyperfine result row into our statistics shape
 */
export function toMeasurement(row: HyperfineResult): Measurement {
  const times = row.times ?? [];
  return {
    statistics: {
      mean: row.mean,
      stddev: row.stddev ?? 0,
      median: row.median,
      min: row.min,
      max: row.max,
      samples: times.length,
      times,
    },
    exitCodes: (row.exit_codes ?? []).map(code => code ?? SIGNALLED_EXIT_CODE),
  };
}

export function parseHyperfineExport(raw: string, commandName: string): Measurement {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new TimingEngineError('hyperfine', `unreadable export: ${errorMessage(error)}`);
  }

  const parsed = HyperfineExportSchema.safeParse(data);
  if (!parsed.success) {
    throw new TimingEngineError('hyperfine', `unexpected export format: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const row = parsed.data.results.find(r => r.command === commandName) ?? parsed.data.results[0];
  if (!row) {
    throw new TimingEngineError('hyperfine', `no result for ${commandName}`);
  }
  return toMeasurement(row);
}

export class HyperfineEngine implements TimingEngine {
  readonly name = 'hyperfine';
  private binary: string;

  constructor(binary: string = 'hyperfine') {
    this.binary = binary;
  }

  async version(): Promise<string | null> {
    const line = await commandVersion(this.binary);
    return line ? line.replace(/^hyperfine\s+/, '') : null;
  }

  /**
   * Command-line arguments for one measurement
   */
  buildArgs(request: MeasurementRequest): string[] {
    const args = ['--shell=bash', '--ignore-failure', '--style', 'basic'];

    if (request.warmup > 0) {
      args.push('--warmup', String(request.warmup));
    }
    if (request.runs.kind === 'min') {
      args.push('--min-runs', String(request.runs.runs));
    } else {
      args.push('--runs', String(request.runs.runs));
    }
    if (request.prepare) {
      args.push('--prepare', request.prepare);
    }
    if (request.conclude) {
      args.push('--conclude', request.conclude);
    }

    args.push(
      '--export-json', request.exportJsonPath,
      '--command-name', request.name,
      request.command
    );
    return args;
  }

  async measure(request: MeasurementRequest): Promise<Measurement> {
    fs.rmSync(request.exportJsonPath, { force: true });

    let result: CommandResult;
    try {
      result = await runCommand(this.binary, this.buildArgs(request), {
        env: request.env,
        cwd: request.cwd,
        timeoutMs: request.timeoutMs,
      });
    } catch (error) {
      throw new TimingEngineError(this.name, errorMessage(error), { tool: request.name });
    }

    if (result.timedOut) {
      throw new TimingEngineError(
        this.name,
        `timed out after ${request.timeoutMs}ms`,
        { tool: request.name }
      );
    }
    if (result.exitCode !== 0) {
      const tail = result.stderr.trim().split('\n').slice(-3).join(' | ');
      throw new TimingEngineError(
        this.name,
        `exited with status ${result.exitCode}${tail ? `: ${tail}` : ''}`,
        { tool: request.name }
      );
    }
    if (!fs.existsSync(request.exportJsonPath)) {
      throw new TimingEngineError(this.name, 'no JSON export written', { tool: request.name });
    }

    return parseHyperfineExport(fs.readFileSync(request.exportJsonPath, 'utf-8'), request.name);
  }
}
