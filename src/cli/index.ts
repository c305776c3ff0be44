#!/usr/bin/env node
/**
 * FASTQ Bench CLI
 * Command-line interface for the parser benchmark harness
 */

import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import { runCli, CliOptions } from './run.js';

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new CommanderArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new CommanderArgumentError('Expected a positive number.');
  }
  return n;
}

const program = new Command();

program
  .name('fastq-bench')
  .description('Benchmark FASTQ parsers on raw, gzip and bgzip inputs under hot and cold page-cache conditions')
  .version('1.0.0')
  .option('-w, --warmup <n>', 'Number of warmup runs for hot scenarios (default: 1)', parseCount)
  .option('-r, --runs <n>', 'Minimum number of benchmark runs for hot scenarios (default: 2)', parseCount)
  .option('--cold-runs <n>', 'Fixed number of runs for cold and really-cold scenarios (default: 3)', parseCount)
  .option('-z, --sizes <sizes>', 'Comma-separated sizes to benchmark, e.g. "0.1m,1m,10m"; missing sizes are generated')
  .option('-s, --skip-cold', 'Skip cold (and really-cold) scenarios')
  .option('-C, --skip-compression', 'Skip the bgzip vs gzip compression comparison')
  .option('--really-cold', 'Also run really-cold scenarios (inputs regenerated before each tool)')
  .option('--root <path>', 'Project root directory (default: $FASTQ_BENCH_ROOT or the current directory)')
  .option('--ram-path <path>', 'Fast storage directory for staged copies (default: /tmp, alternative: /dev/shm)')
  .option('--tools-dir <path>', 'Directory of tool wrappers (default: <root>/tools)')
  .option('--timeout <seconds>', 'Timeout for one tool measurement (default: 3600)', parsePositive)
  .option('--config <file>', 'JSON config file (default: <root>/fastq-bench.config.json)')
  .option('-v, --verbose', 'Show per-tool output paths')
  .addHelpText('after', `
Cache scenarios:
  hot          Input copied to fast storage (--ram-path) before measuring
  cold         Input pages evicted from the page cache with vmtouch before
               each run; if vmtouch is missing or fails, the input is
               re-copied to fast storage before each run instead and the
               fallback is recorded in <scenario>_cache_status.txt
  really-cold  Input regenerated from scratch (fresh genome, reads and
               compression) before each tool (--really-cold)

Formats:
  raw    <size>.fastq
  gzip   <size>.fastq.gz
  bgzip  <size>.fastq_bgzipped.gz (skipped with --skip-compression)

Tools are the executables in <root>/tools, each called as
  <tool> <input-file>
with its report written to stdout.

Results are saved to <root>/benchmark_results/benchmark_<YYYYMMDD_HHMMSS>/

Examples:
  fastq-bench                        # all sizes found in <root>/test-data
  fastq-bench --sizes 1m             # only 1m reads
  fastq-bench -z "0.5m,1m" -s        # 0.5m and 1m, hot only
  fastq-bench -z 5m --really-cold    # generate 5m if missing, all cache states
`)
  .action(async (options: CliOptions) => {
    process.exitCode = await runCli(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
