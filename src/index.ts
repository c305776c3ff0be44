/**
 * FASTQ Bench - benchmark harness for FASTQ parsers
 *
 * Measures every tool in a tools directory against raw, gzip and bgzip
 * inputs of several sizes, under three page-cache conditions:
 * - Hot (input copied to fast storage)
 * - Cold (pages evicted before each run, or a RAM-copy fallback)
 * - Really-cold (input regenerated from scratch before each tool)
 */

export * from './types.js';
export * from './errors.js';
export * from './utils/index.js';
export * from './tools/index.js';
export * from './generation/index.js';
export * from './matrix/index.js';
export * from './cache/index.js';
export * from './trials/index.js';
export * from './results/index.js';
export * from './harness.js';
