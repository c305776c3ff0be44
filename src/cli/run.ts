/**
 * CLI entry logic, separate from argument parsing so it can be tested
 */

import * as path from 'path';
import { BenchConfig } from '../types.js';
import { PersistenceFailure, SetupError, isHarnessError } from '../errors.js';
import { loadConfig } from '../utils/config.js';
import { parseSizeList } from '../utils/size-label.js';
import { killActiveCommands } from '../utils/process.js';
import { BenchmarkHarness, HarnessDependencies } from '../harness.js';

export interface CliOptions {
  warmup?: number;
  runs?: number;
  coldRuns?: number;
  sizes?: string;
  skipCold?: boolean;
  skipCompression?: boolean;
  reallyCold?: boolean;
  root?: string;
  ramPath?: string;
  toolsDir?: string;
  timeout?: number;
  config?: string;
  verbose?: boolean;
}

export const EXIT_OK = 0;
export const EXIT_SETUP = 1;
export const EXIT_PERSISTENCE = 2;

/**
 * Translate parsed flags into config overrides, leaving unset flags out
 */
export function buildOverrides(options: CliOptions): Partial<BenchConfig> {
  const overrides: Partial<BenchConfig> = {};

  if (options.root !== undefined) overrides.projectRoot = path.resolve(options.root);
  if (options.ramPath !== undefined) overrides.ramPath = path.resolve(options.ramPath);
  if (options.toolsDir !== undefined) overrides.toolsDir = path.resolve(options.toolsDir);
  if (options.warmup !== undefined) overrides.warmup = options.warmup;
  if (options.runs !== undefined) overrides.minRuns = options.runs;
  if (options.coldRuns !== undefined) overrides.coldRuns = options.coldRuns;
  if (options.timeout !== undefined) overrides.timeoutSeconds = options.timeout;
  if (options.sizes !== undefined) overrides.sizes = parseSizeList(options.sizes);
  if (options.skipCold) overrides.skipCold = true;
  if (options.skipCompression) overrides.skipCompression = true;
  if (options.reallyCold) overrides.reallyCold = true;
  if (options.verbose) overrides.verbose = true;

  return overrides;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof PersistenceFailure) return EXIT_PERSISTENCE;
  if (error instanceof SetupError) return EXIT_SETUP;
  return EXIT_SETUP;
}

/**
 * Load config, run the harness, and map the outcome to an exit code
 */
export async function runCli(options: CliOptions, deps: HarnessDependencies = {}): Promise<number> {
  let harness: BenchmarkHarness;
  try {
    const config = loadConfig({
      configPath: options.config,
      overrides: buildOverrides(options),
    });
    harness = new BenchmarkHarness(config, deps);
  } catch (error) {
    reportError(error);
    return exitCodeFor(error);
  }

  const onSignal = (signal: NodeJS.Signals, code: number): void => {
    console.warn(`\nReceived ${signal}, removing staged input...`);
    // Commands run in their own process groups and miss the terminal's signal
    killActiveCommands();
    harness.releaseCurrent().then(
      () => process.exit(code),
      (error: unknown) => {
        console.error('Cleanup failed:', error);
        process.exit(code);
      }
    );
  };
  const onInt = (): void => onSignal('SIGINT', 130);
  const onTerm = (): void => onSignal('SIGTERM', 143);
  process.once('SIGINT', onInt);
  process.once('SIGTERM', onTerm);

  try {
    await harness.run();
    return EXIT_OK;
  } catch (error) {
    reportError(error);
    return exitCodeFor(error);
  } finally {
    process.removeListener('SIGINT', onInt);
    process.removeListener('SIGTERM', onTerm);
  }
}

function reportError(error: unknown): void {
  if (isHarnessError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error('Error:', error);
  }
}
