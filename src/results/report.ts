/**
 * Human-readable renderings of scenario and run results
 */

import {
  CacheStatus,
  RunSummary,
  TestScenario,
  TrialResult,
} from '../types.js';

const FORMAT_LABELS = {
  raw: 'Raw FASTQ',
  gzip: 'Gzipped FASTQ',
  bgzip: 'Bgzipped FASTQ',
} as const;

const CACHE_LABELS = {
  hot: 'Hot',
  cold: 'Cold',
  'really-cold': 'Really-cold',
} as const;

export function scenarioTitle(scenario: TestScenario): string {
  return `${CACHE_LABELS[scenario.cacheState]} Benchmark: ${FORMAT_LABELS[scenario.format]} (${scenario.size})`;
}

function ms(seconds: number): string {
  return (seconds * 1000).toFixed(1);
}

/**
 * Markdown table in the style of hyperfine's --export-markdown
 */
export function formatScenarioMarkdown(
  scenario: TestScenario,
  status: CacheStatus,
  results: TrialResult[]
): string {
  const measured = results.filter(r => r.statistics !== null && r.exitStatus === 0);
  const fastest = measured.length > 0
    ? Math.min(...measured.map(r => r.statistics?.mean ?? Infinity))
    : null;

  const lines: string[] = [
    `# ${scenarioTitle(scenario)}`,
    '',
    `**Cache method:** ${status.method}${status.outcome.kind === 'degraded' ? ` (fallback: ${status.outcome.reason})` : ''}`,
    `**Input:** \`${status.stagedFile}\``,
    '',
    '| Tool | Mean [ms] | Min [ms] | Max [ms] | Relative | Exit |',
    '|:---|---:|---:|---:|---:|---:|',
  ];

  for (const result of results) {
    const stats = result.statistics;
    if (!stats) {
      lines.push(`| \`${result.toolId}\` | – | – | – | – | ${result.exitStatus} |`);
      continue;
    }
    const relative = fastest && result.exitStatus === 0
      ? (stats.mean / fastest).toFixed(2)
      : '–';
    lines.push(
      `| \`${result.toolId}\` | ${ms(stats.mean)} ± ${ms(stats.stddev)} | ${ms(stats.min)} | ${ms(stats.max)} | ${relative} | ${result.exitStatus} |`
    );
  }

  const failures = results.filter(r => r.error);
  if (failures.length > 0) {
    lines.push('', '## Failures', '');
    for (const result of failures) {
      lines.push(`- \`${result.toolId}\`: ${result.error}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * key=value sidecar describing how the input was staged
 */
export function formatCacheStatus(status: CacheStatus): string {
  const lines = [
    `cache_method=${status.method}`,
    `outcome=${status.outcome.kind}`,
  ];
  if (status.outcome.kind === 'degraded') {
    lines.push(`reason=${status.outcome.reason}`);
  }
  lines.push(
    `timestamp=${status.timestamp.toISOString()}`,
    `original_file=${status.originalFile}`,
    `staged_file=${status.stagedFile}`,
  );
  return lines.join('\n') + '\n';
}

export function formatBytes(bytes: number | null): string {
  if (bytes === null) return 'N/A';
  const units = ['B', 'K', 'M', 'G', 'T'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value}${units[unit]}` : `${value.toFixed(1)}${units[unit]}`;
}

/**
 * Plain-text run summary
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [
    'FASTQ Parser Benchmark Summary',
    '==============================',
    `Run: ${summary.runId}`,
    `Started: ${summary.startedAt.toISOString()}`,
    `Finished: ${summary.finishedAt.toISOString()}`,
    `Host: ${summary.host}`,
    '',
    'Test Configuration:',
    `  Test sizes benchmarked: ${summary.sizes.join(' ') || '(none)'}`,
    `  Formats: ${summary.formats.join(', ')}`,
    `  Cache states: ${summary.cacheStates.join(', ')}`,
    `  Warmup runs: ${summary.warmup}`,
    `  Benchmark runs: ${summary.minRuns}`,
    `  Cold runs: ${summary.coldRuns}`,
    `  Tools: ${summary.tools.join(', ')}`,
    '',
    'File sizes:',
  ];

  for (const size of summary.sizes) {
    lines.push(`  ${size}:`);
    for (const file of summary.inputFiles.filter(f => f.size === size)) {
      lines.push(`    ${file.format.padEnd(6)} ${formatBytes(file.bytes)}`);
    }
  }

  lines.push('', `Scenarios executed (${summary.scenarios.length}):`);
  for (const record of summary.scenarios) {
    const failed = record.results.filter(r => r.exitStatus !== 0).map(r => r.toolId);
    const note = failed.length > 0 ? `; failed: ${failed.join(', ')}` : '';
    const degraded = record.degraded ? ' (degraded)' : '';
    lines.push(`  - ${record.scenario.key} [${record.method}${degraded}] ${record.results.length} tools${note}`);
  }

  if (summary.generationFailures.length > 0) {
    lines.push('', 'Sizes skipped (generation failed):');
    for (const failure of summary.generationFailures) {
      lines.push(`  - ${failure.size}: ${failure.reason}`);
    }
  }

  if (summary.stagingFailures.length > 0) {
    lines.push('', 'Scenarios skipped (staging failed):');
    for (const failure of summary.stagingFailures) {
      lines.push(`  - ${failure.scenario.key}: ${failure.reason}`);
    }
  }

  lines.push('', 'Result tree:');
  for (const entry of summary.resultTree) {
    lines.push(`  ${entry}`);
  }
  lines.push('', `Total result files: ${summary.resultTree.filter(e => !e.endsWith('/')).length}`);
  lines.push('');

  return lines.join('\n');
}
