import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import { formatSize } from '../cache/cache-store';
import type { CacheStats } from '../cache/types';
import type { PipelineReport } from '../cli/types';

const LABEL_WIDTH = 18;

/**
 * Milliseconds with two decimals below one second, seconds with two decimals above.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(2)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

function statRow(label: string, value: string): string {
  const colored = chalk.cyan(`${label}:`);
  const pad = Math.max(1, LABEL_WIDTH - stripAnsi(colored).length);
  return `  ${colored}${' '.repeat(pad)}${value}`;
}

export function formatStats(report: PipelineReport): string[] {
  const cache = report.compileResult.cacheHit
    ? chalk.green('Hit (binary reused)')
    : chalk.yellow('Miss (compiled)');
  return [
    '',
    chalk.bold('Statistics:'),
    statRow('Compilation time', formatDuration(report.compileMs)),
    statRow('Execution time', formatDuration(report.executeMs)),
    statRow('Total time', formatDuration(report.totalMs)),
    statRow('Cache', cache),
  ];
}

// Timing goes to stderr so it never mixes with the program's output
export function printStats(report: PipelineReport) {
  for (const line of formatStats(report)) {
    console.error(line);
  }
}

export function formatCacheStats(stats: CacheStats, cacheDir: string): string[] {
  return [
    'Cache statistics:',
    `  Cached binaries: ${stats.binaryCount}`,
    `  Total size: ${formatSize(stats.totalBytes)}`,
    `  Cache directory: ${cacheDir}`,
  ];
}

export function printCacheStats(stats: CacheStats, cacheDir: string) {
  for (const line of formatCacheStats(stats, cacheDir)) {
    console.log(line);
  }
}
