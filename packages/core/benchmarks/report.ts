/**
 * @module report
 * Benchmark result formatting and the radius-independence check.
 *
 * Scenarios sharing an image size differ only in sigma, so their median
 * times should stay within a small ratio of each other.
 */

/** Timing of one scenario. */
export interface BenchmarkResult {
  /** Scenario identifier (e.g. "A1"). */
  scenarioId: string;
  label: string;
  /** Image dimensions string (e.g. "800x200x3"). */
  resolution: string;
  sigma: number;
  /** Planned box half-widths, comma separated. */
  boxes: string;
  medianMs: number;
  minMs: number;
  maxMs: number;
  /** Median throughput in megapixels per second. */
  megapixelsPerSecond: number;
}

/** Slowest-to-fastest median ratio among scenarios of one image size. */
export interface RadiusSpread {
  resolution: string;
  fastest: BenchmarkResult;
  slowest: BenchmarkResult;
  ratio: number;
}

/**
 * Group results by image size and compare their medians.
 * Sizes with a single scenario are skipped.
 */
export function radiusSpreads(results: readonly BenchmarkResult[]): RadiusSpread[] {
  const groups = new Map<string, BenchmarkResult[]>();
  for (const r of results) {
    const group = groups.get(r.resolution);
    if (group) group.push(r);
    else groups.set(r.resolution, [r]);
  }

  const spreads: RadiusSpread[] = [];
  for (const [resolution, group] of groups) {
    if (group.length < 2) continue;
    const sorted = [...group].sort((a, b) => a.medianMs - b.medianMs);
    const fastest = sorted[0];
    const slowest = sorted[sorted.length - 1];
    const ratio = fastest.medianMs > 0 ? slowest.medianMs / fastest.medianMs : 1;
    spreads.push({ resolution, fastest, slowest, ratio });
  }
  return spreads;
}

/**
 * Print one line per scenario, then the spread per image size.
 *
 * @param maxSpread - Largest acceptable slowest/fastest ratio.
 * @returns Whether every size stayed within `maxSpread`.
 */
export function printReport(results: readonly BenchmarkResult[], maxSpread: number): boolean {
  /* eslint-disable no-console */
  console.log('');
  for (const r of results) {
    console.log(
      `  ${r.scenarioId.padEnd(4)} ${r.resolution.padEnd(16)} sigma=${String(r.sigma).padEnd(5)} ` +
        `boxes=${r.boxes.padEnd(12)} median ${r.medianMs.toFixed(2)}ms ` +
        `[${r.minMs.toFixed(2)}..${r.maxMs.toFixed(2)}] ${r.megapixelsPerSecond.toFixed(1)} MP/s`,
    );
  }

  console.log('');
  let ok = true;
  for (const s of radiusSpreads(results)) {
    const within = s.ratio <= maxSpread;
    ok &&= within;
    console.log(
      `  ${s.resolution}: sigma ${s.fastest.sigma} -> ${s.slowest.sigma} ` +
        `spread x${s.ratio.toFixed(2)} (limit x${maxSpread}) ${within ? 'OK' : 'RADIUS-DEPENDENT'}`,
    );
  }
  console.log('');
  /* eslint-enable no-console */
  return ok;
}
