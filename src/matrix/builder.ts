/**
 * Test Matrix Builder
 * Expands sizes × formats × cache-states into the ordered scenario list
 * for a run, generating any missing canonical inputs first.
 */

import * as fs from 'fs';
import {
  CacheState,
  CACHE_STATES,
  FORMAT_TAGS,
  GenerationFailureRecord,
  InputFormat,
  INPUT_FORMATS,
  TestScenario,
} from '../types.js';
import { GenerationFailure, SetupError, errorMessage } from '../errors.js';
import { DataGenerator } from '../generation/generator.js';
import { inputFilePath, sizeFromRawFileName } from '../generation/files.js';
import { isSizeLabel, sortSizeLabels } from '../utils/size-label.js';

// Generated when auto-discovery finds no inputs at all
export const STANDARD_SIZES: readonly string[] = ['0.1m', '0.5m', '1m', '10m', '30m', '50m', '70m'];

export interface MatrixOptions {
  dataDir: string;
  /** Explicit size labels; empty or omitted means auto-discovery */
  sizes?: string[];
  formats: InputFormat[];
  cacheStates: CacheState[];
  generator: DataGenerator;
}

export interface TestMatrix {
  scenarios: readonly TestScenario[];
  sizes: string[];
  generatedSizes: string[];
  generationFailures: GenerationFailureRecord[];
}

export function scenarioKey(size: string, format: InputFormat, cacheState: CacheState): string {
  return `${size}/${cacheState}_${FORMAT_TAGS[format]}`;
}

export function createScenario(
  size: string,
  format: InputFormat,
  cacheState: CacheState
): TestScenario {
  return Object.freeze({
    size,
    format,
    cacheState,
    key: scenarioKey(size, format, cacheState),
  });
}

/**
 * Cartesian expansion in fixed order: size ascending, then format, then cache state
 */
export function expandScenarios(
  sizes: string[],
  formats: InputFormat[],
  cacheStates: CacheState[]
): TestScenario[] {
  const orderedFormats = INPUT_FORMATS.filter(f => formats.includes(f));
  const orderedStates = CACHE_STATES.filter(s => cacheStates.includes(s));
  const scenarios: TestScenario[] = [];

  for (const size of sortSizeLabels(sizes)) {
    for (const format of orderedFormats) {
      for (const cacheState of orderedStates) {
        scenarios.push(createScenario(size, format, cacheState));
      }
    }
  }

  return scenarios;
}

/**
 * Size labels of every `<n>m.fastq` file in a data directory
 */
export function discoverSizes(dataDir: string): string[] {
  if (!fs.existsSync(dataDir)) {
    return [];
  }

  const sizes: string[] = [];
  for (const entry of fs.readdirSync(dataDir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const size = sizeFromRawFileName(entry.name);
    if (size !== null && isSizeLabel(size)) {
      sizes.push(size);
    }
  }
  return sortSizeLabels(sizes);
}

/**
 * Canonical formats that must exist on disk; really-cold never reads them
 */
export function requiredCanonicalFormats(
  formats: InputFormat[],
  cacheStates: CacheState[]
): InputFormat[] {
  const usesCanonical = cacheStates.some(s => s !== 'really-cold');
  return usesCanonical ? INPUT_FORMATS.filter(f => formats.includes(f)) : [];
}

export function missingFormats(dataDir: string, size: string, formats: InputFormat[]): InputFormat[] {
  return formats.filter(f => !fs.existsSync(inputFilePath(dataDir, size, f)));
}

/**
 * Build the scenario list for a run
 */
export async function buildTestMatrix(options: MatrixOptions): Promise<TestMatrix> {
  const { dataDir, formats, cacheStates, generator } = options;
  const explicit = options.sizes ?? [];

  let sizes: string[];
  if (explicit.length > 0) {
    const invalid = explicit.filter(s => !isSizeLabel(s));
    if (invalid.length > 0) {
      throw new SetupError(
        `Invalid size label(s): ${invalid.join(', ')} (expected e.g. 0.1m, 1m, 10m)`,
        'INVALID_SIZE',
        { invalid }
      );
    }
    sizes = sortSizeLabels(explicit);
    console.log(`Using specified sizes: ${sizes.join(', ')}`);
  } else {
    sizes = discoverSizes(dataDir);
    if (sizes.length === 0) {
      sizes = [...STANDARD_SIZES];
      console.log(`No test files found in ${dataDir}. Generating standard sizes: ${sizes.join(' ')}`);
    } else {
      console.log(`Found ${sizes.length} test sizes: ${sizes.join(' ')}`);
    }
  }

  const required = requiredCanonicalFormats(formats, cacheStates);
  const usable: string[] = [];
  const generatedSizes: string[] = [];
  const generationFailures: GenerationFailureRecord[] = [];

  for (const size of sizes) {
    const missing = missingFormats(dataDir, size, required);
    if (missing.length === 0) {
      usable.push(size);
      continue;
    }

    console.log(`Test files for size ${size} not found (${missing.join(', ')}). Generating...`);
    try {
      await generator.generate({ size, formats: missing, outputDir: dataDir });

      const stillMissing = missingFormats(dataDir, size, required);
      if (stillMissing.length > 0) {
        throw new GenerationFailure(size, `generator did not produce ${stillMissing.join(', ')}`);
      }

      usable.push(size);
      generatedSizes.push(size);
    } catch (error) {
      const reason = error instanceof GenerationFailure && typeof error.context?.reason === 'string'
        ? error.context.reason
        : errorMessage(error);
      console.warn(`⚠ Skipping size ${size}: ${reason}`);
      generationFailures.push({ size, reason });
    }
  }

  return {
    scenarios: Object.freeze(expandScenarios(usable, formats, cacheStates)),
    sizes: usable,
    generatedSizes,
    generationFailures,
  };
}
