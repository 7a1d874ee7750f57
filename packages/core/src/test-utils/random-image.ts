/**
 * @module test-utils/random-image
 * Deterministic sample generators shared by tests and benchmarks.
 */

import type { PixelImage } from '@fastgauss/types';
import { createPixelImage } from '../pixel-image';

/** Mulberry32 PRNG returning integers in `[0, 256)`. */
export function byteSource(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) & 0xff;
  };
}

/** Fill a new buffer with `length` pseudo-random bytes. */
export function randomBytes(length: number, seed: number): Uint8Array {
  const next = byteSource(seed);
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = next();
  return out;
}

/** Image with pseudo-random samples in every channel. */
export function randomImage(width: number, height: number, channels: number, seed = 1): PixelImage {
  return createPixelImage(width, height, channels, randomBytes(width * height * channels, seed));
}

/** Image with every sample set to `value`. */
export function uniformImage(width: number, height: number, channels: number, value: number): PixelImage {
  return createPixelImage(width, height, channels, new Uint8Array(width * height * channels).fill(value));
}
