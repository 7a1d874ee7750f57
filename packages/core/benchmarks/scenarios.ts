/**
 * @module scenarios
 * Benchmark scenario definitions for blur performance measurement.
 *
 * Scenarios pair image sizes with small and large radii. Timings within a
 * size should stay close whatever the radius.
 */

import type { PixelImage, Radius, Size } from '@fastgauss/types';
import { toRadius } from '../src/filters';
import { randomImage } from '../src/test-utils/random-image';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Describes a single benchmark scenario. */
export interface BenchmarkScenario {
  /** Short identifier (e.g. "A1"). */
  id: string;
  /** Human-readable label. */
  label: string;
  /** Image dimensions. */
  size: Size;
  /** Interleaved channels per pixel. */
  channels: number;
  /** Blur sigma. */
  radius: Radius;
  /** Source pixels; each run blurs a fresh copy. */
  source: PixelImage;
}

// ---------------------------------------------------------------------------
// Scenario table
// ---------------------------------------------------------------------------

interface ScenarioRow {
  id: string;
  label: string;
  width: number;
  height: number;
  channels: number;
  sigma: number;
}

const SCENARIO_TABLE: readonly ScenarioRow[] = [
  { id: 'A1', label: 'Strip RGB, sigma 2', width: 800, height: 200, channels: 3, sigma: 2 },
  { id: 'A2', label: 'Strip RGB, sigma 15', width: 800, height: 200, channels: 3, sigma: 15 },
  { id: 'A3', label: 'Strip RGB, sigma 50', width: 800, height: 200, channels: 3, sigma: 50 },
  { id: 'B1', label: 'Gray 1080p, sigma 2', width: 1920, height: 1080, channels: 1, sigma: 2 },
  { id: 'B2', label: 'Gray 1080p, sigma 50', width: 1920, height: 1080, channels: 1, sigma: 50 },
  { id: 'C1', label: 'RGBA 720p, sigma 5', width: 1280, height: 720, channels: 4, sigma: 5 },
  { id: 'C2', label: 'RGBA 720p, sigma 80', width: 1280, height: 720, channels: 4, sigma: 80 },
];

/**
 * Build all benchmark scenarios with deterministic source images.
 */
export function buildScenarios(): BenchmarkScenario[] {
  return SCENARIO_TABLE.map((row, index) => ({
    id: row.id,
    label: row.label,
    size: { width: row.width, height: row.height },
    channels: row.channels,
    radius: toRadius(row.sigma),
    source: randomImage(row.width, row.height, row.channels, index + 1),
  }));
}
