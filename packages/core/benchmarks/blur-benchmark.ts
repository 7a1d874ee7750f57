/**
 * @module blur-benchmark
 * Benchmark runner for the box-filter Gaussian blur.
 *
 * Runs each scenario multiple times on a fresh copy of its source image and
 * fails when scenarios of the same image size but different sigma differ in
 * median time by more than the allowed spread.
 *
 * Usage:
 * ```
 * npm run bench -- --runs 20
 * ```
 *
 * Flags:
 * - `--json`              Output results as JSON to stdout
 * - `--runs <n>`          Override number of runs per scenario (default: 10)
 * - `--max-spread <x>`    Allowed slowest/fastest ratio per size (default: 2)
 */

import { boxesForGauss, clonePixelImage, gaussianBlur } from '../src';
import { buildScenarios } from './scenarios';
import type { BenchmarkScenario } from './scenarios';
import type { BenchmarkResult } from './report';
import { printReport } from './report';

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

interface CliOptions {
  /** Number of runs per scenario. */
  runs: number;
  /** Largest acceptable median ratio between sigmas at one size. */
  maxSpread: number;
  /** Whether to output JSON instead of the text report. */
  jsonOutput: boolean;
}

/** Parse command-line arguments. */
function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = { runs: 10, maxSpread: 2, jsonOutput: false };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--runs' && next !== undefined) {
      const parsed = parseInt(next, 10);
      if (parsed > 0) options.runs = parsed;
      i++;
    } else if (args[i] === '--max-spread' && next !== undefined) {
      const parsed = parseFloat(next);
      if (parsed >= 1) options.maxSpread = parsed;
      i++;
    } else if (args[i] === '--json') {
      options.jsonOutput = true;
    }
  }

  return options;
}

// ---------------------------------------------------------------------------
// Measurement
// ---------------------------------------------------------------------------

/**
 * Compute the median of a sorted numeric array.
 */
function median(sorted: readonly number[]): number {
  const len = sorted.length;
  if (len === 0) return 0;
  const mid = Math.floor(len / 2);
  return len % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

/**
 * Run a single benchmark scenario the specified number of times.
 *
 * @param scenario - The scenario to benchmark.
 * @param runs - Number of timed iterations.
 * @returns The benchmark result with timing stats.
 */
function runScenario(scenario: BenchmarkScenario, runs: number): BenchmarkResult {
  const { size, channels, radius, source } = scenario;

  // Warm-up run (not counted)
  gaussianBlur(clonePixelImage(source), radius);

  const times: number[] = [];
  for (let i = 0; i < runs; i++) {
    const image = clonePixelImage(source);
    const start = performance.now();
    gaussianBlur(image, radius);
    times.push(performance.now() - start);
  }

  times.sort((a, b) => a - b);

  const medianMs = median(times);
  const pixels = size.width * size.height;

  return {
    scenarioId: scenario.id,
    label: scenario.label,
    resolution: `${size.width}x${size.height}x${channels}`,
    sigma: radius,
    boxes: boxesForGauss(radius).join(','),
    medianMs,
    minMs: times[0],
    maxMs: times[times.length - 1],
    megapixelsPerSecond: medianMs > 0 ? pixels / 1e6 / (medianMs / 1000) : 0,
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Entry point: build scenarios, time them, report the spread per size.
 */
function main(): void {
  const opts = parseArgs();
  const scenarios = buildScenarios();
  const results: BenchmarkResult[] = [];

  for (const scenario of scenarios) {
    if (!opts.jsonOutput) process.stdout.write(`  [${scenario.id}] ${scenario.label} ... `);
    const result = runScenario(scenario, opts.runs);
    results.push(result);
    // eslint-disable-next-line no-console
    if (!opts.jsonOutput) console.log(`${result.medianMs.toFixed(2)}ms`);
  }

  if (opts.jsonOutput) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(results, null, 2));
    return;
  }

  if (!printReport(results, opts.maxSpread)) {
    process.exitCode = 1;
  }
}

main();
