/**
 * Test Data Generation
 * Adapter around the BBTools synthesis scripts: reference genome, then
 * reads, then compression.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { InputFormat, INPUT_FORMATS } from '../types.js';
import { GenerationFailure, errorMessage } from '../errors.js';
import { runCommand } from '../utils/process.js';
import { readsForSize } from '../utils/size-label.js';
import { inputFilePath } from './files.js';

export const CANONICAL_SEED = 42;

export interface GenerateRequest {
  size: string;
  formats: InputFormat[];
  outputDir: string;
  /** Defaults to the canonical seed; really-cold staging passes a fresh one */
  seed?: number;
}

export type GeneratedFiles = Partial<Record<InputFormat, string>>;

/**
 * Produces FASTQ inputs for a size label
 */
export interface DataGenerator {
  generate(request: GenerateRequest): Promise<GeneratedFiles>;
}

export interface BBToolsGeneratorOptions {
  bbtoolsDir: string;
  genomeLength?: number;
  readLength?: number;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export class BBToolsDataGenerator implements DataGenerator {
  private bbtoolsDir: string;
  private genomeLength: number;
  private readLength: number;
  private timeoutMs?: number;
  private env: NodeJS.ProcessEnv;

  constructor(options: BBToolsGeneratorOptions) {
    this.bbtoolsDir = options.bbtoolsDir;
    this.genomeLength = options.genomeLength ?? 100_000;
    this.readLength = options.readLength ?? 150;
    this.timeoutMs = options.timeoutMs;
    this.env = options.env ?? process.env;
  }

  async generate(request: GenerateRequest): Promise<GeneratedFiles> {
    const { size, outputDir } = request;
    const seed = request.seed ?? CANONICAL_SEED;
    const reads = readsForSize(size);
    const formats = INPUT_FORMATS.filter(f => request.formats.includes(f));

    const rawPath = inputFilePath(outputDir, size, 'raw');
    const needRaw = formats.includes('raw') || (formats.includes('gzip') && !fs.existsSync(rawPath));
    const needGenome = needRaw || formats.includes('bgzip');

    fs.mkdirSync(outputDir, { recursive: true });

    const genomePath = path.join(outputDir, `ref_genome_${uuidv4()}.fa`);
    const created: string[] = [];
    const files: GeneratedFiles = {};

    try {
      if (needGenome) {
        console.log(`  Creating reference genome (${this.genomeLength} bp, seed ${seed})...`);
        await this.script('randomgenome.sh', [
          `len=${this.genomeLength}`,
          `seed=${seed}`,
          `out=${genomePath}`,
        ], size);
      }

      if (needRaw) {
        console.log(`  Creating raw FASTQ (${reads} reads)...`);
        created.push(rawPath);
        await this.synthesizeReads(genomePath, rawPath, reads, seed, size);
      }
      if (formats.includes('raw')) {
        files.raw = rawPath;
      }

      if (formats.includes('gzip')) {
        const gzPath = inputFilePath(outputDir, size, 'gzip');
        console.log('  Creating gzipped FASTQ...');
        created.push(gzPath);
        await pipeline(
          fs.createReadStream(rawPath),
          zlib.createGzip(),
          fs.createWriteStream(gzPath)
        );
        files.gzip = gzPath;
      }

      // randomreads.sh writes BGZF whenever its output ends in .gz
      if (formats.includes('bgzip')) {
        const bgzPath = inputFilePath(outputDir, size, 'bgzip');
        console.log('  Creating bgzipped FASTQ...');
        created.push(bgzPath);
        await this.synthesizeReads(genomePath, bgzPath, reads, seed, size);
        files.bgzip = bgzPath;
      }
    } catch (error) {
      // A half-written input would pass the existence check on the next run
      for (const file of created) {
        fs.rmSync(file, { force: true });
      }
      if (error instanceof GenerationFailure) throw error;
      throw new GenerationFailure(size, errorMessage(error));
    } finally {
      fs.rmSync(genomePath, { force: true });
    }

    for (const format of formats) {
      const file = files[format];
      if (!file || !fs.existsSync(file) || fs.statSync(file).size === 0) {
        throw new GenerationFailure(size, `${format} output missing or empty: ${file}`);
      }
    }

    return files;
  }

  private async synthesizeReads(
    genomePath: string,
    outPath: string,
    reads: number,
    seed: number,
    size: string
  ): Promise<void> {
    await this.script('randomreads.sh', [
      `ref=${genomePath}`,
      `out=${outPath}`,
      `reads=${reads}`,
      `length=${this.readLength}`,
      `seed=${seed}`,
    ], size);
  }

  private async script(name: string, args: string[], size: string): Promise<void> {
    const scriptPath = path.join(this.bbtoolsDir, name);
    const result = await runCommand(scriptPath, args, {
      env: this.env,
      timeoutMs: this.timeoutMs,
    });

    if (result.exitCode !== 0) {
      const tail = result.stderr.trim().split('\n').slice(-3).join(' | ');
      throw new GenerationFailure(
        size,
        `${name} exited with status ${result.exitCode}${tail ? `: ${tail}` : ''}`
      );
    }
  }
}
