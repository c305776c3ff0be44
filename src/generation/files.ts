/**
 * Canonical input file names inside a data directory
 */

import * as path from 'path';
import { InputFormat } from '../types.js';

const SUFFIXES: Record<InputFormat, string> = {
  raw: '.fastq',
  gzip: '.fastq.gz',
  bgzip: '.fastq_bgzipped.gz',
};

export function inputFileName(size: string, format: InputFormat): string {
  return `${size}${SUFFIXES[format]}`;
}

export function inputFilePath(dataDir: string, size: string, format: InputFormat): string {
  return path.join(dataDir, inputFileName(size, format));
}

/**
 * Size label for a raw FASTQ file name, e.g. "10m.fastq" -> "10m"
 */
export function sizeFromRawFileName(fileName: string): string | null {
  if (!fileName.endsWith(SUFFIXES.raw)) return null;
  return fileName.slice(0, -SUFFIXES.raw.length);
}
