/**
 * @module filters/box-blur
 * One-dimensional moving-average pass over a single-channel plane.
 *
 * Each line (a row or a column) is filtered with a running sum that is
 * slid one sample at a time, so the cost per output sample is constant
 * whatever the half-width. Samples outside the line repeat the nearest
 * edge sample.
 */

import type { BlurAxis, PixelBuffer } from '@fastgauss/types';

/**
 * Checked reference kernel: every window index is clamped into the line.
 * Works for any `r`, including windows wider than the line, in O(length)
 * whatever `r` is.
 *
 * @param src - Source samples (read only).
 * @param dst - Destination samples, distinct from `src`.
 * @param start - Offset of the first sample of the line.
 * @param step - Distance between consecutive samples of the line.
 * @param length - Number of samples in the line (>= 1).
 * @param r - Box half-width (>= 0).
 */
export function boxBlurLine(
  src: PixelBuffer,
  dst: PixelBuffer,
  start: number,
  step: number,
  length: number,
  r: number,
): void {
  const last = length - 1;
  const at = (i: number): number => src[start + (i < 0 ? 0 : i > last ? last : i) * step];
  const size = r + r + 1;

  // Window at position 0: `r + 1` copies of the first sample, the samples
  // that exist to its right, and the last sample repeated for the rest.
  const inner = r < last ? r : last;
  let sum = (r + 1) * at(0);
  for (let j = 1; j <= inner; j++) sum += at(j);
  if (r > last) sum += (r - last) * at(last);

  for (let i = 0; i < length; i++) {
    dst[start + i * step] = Math.round(sum / size);
    sum += at(i + r + 1) - at(i - r);
  }
}

/**
 * Unclamped kernel: the line is split into a left edge, an interior and a
 * right edge so that no sample index needs a bounds check.
 *
 * Precondition: `2r + 1 < length`. Under it, produces exactly the output of
 * {@link boxBlurLine}.
 */
export function boxBlurLineFast(
  src: PixelBuffer,
  dst: PixelBuffer,
  start: number,
  step: number,
  length: number,
  r: number,
): void {
  const size = r + r + 1;
  const first = src[start];
  const lastValue = src[start + (length - 1) * step];

  let ti = start;
  let li = start;
  let ri = start + (r + 1) * step;

  let sum = (r + 1) * first;
  for (let j = 1; j <= r; j++) sum += src[start + j * step];

  // Left edge: the sample leaving the window is clamped to `first`.
  for (let i = 0; i <= r; i++) {
    dst[ti] = Math.round(sum / size);
    sum += src[ri] - first;
    ri += step;
    ti += step;
  }
  li += step;

  // Interior: both ends of the window are inside the line.
  for (let i = r + 1; i < length - r - 1; i++) {
    dst[ti] = Math.round(sum / size);
    sum += src[ri] - src[li];
    ri += step;
    li += step;
    ti += step;
  }

  // Right edge: the sample entering the window is clamped to `lastValue`.
  for (let i = length - r - 1; i < length; i++) {
    dst[ti] = Math.round(sum / size);
    sum += lastValue - src[li];
    li += step;
    ti += step;
  }
}

/**
 * Apply a box filter of half-width `r` along every row or every column.
 *
 * @param src - Source plane, `width * height` samples (read only).
 * @param dst - Destination plane of the same size, distinct from `src`.
 * @param width - Plane width (>= 1).
 * @param height - Plane height (>= 1).
 * @param r - Box half-width; 0 copies `src` into `dst`.
 * @param axis - `'horizontal'` filters rows, `'vertical'` filters columns.
 */
export function boxBlurPass(
  src: PixelBuffer,
  dst: PixelBuffer,
  width: number,
  height: number,
  r: number,
  axis: BlurAxis,
): void {
  if (r === 0) {
    dst.set(src.subarray(0, width * height));
    return;
  }

  const horizontal = axis === 'horizontal';
  const lines = horizontal ? height : width;
  const length = horizontal ? width : height;
  const lineStride = horizontal ? width : 1;
  const step = horizontal ? 1 : width;
  const kernel = r + r + 1 < length ? boxBlurLineFast : boxBlurLine;

  for (let line = 0; line < lines; line++) {
    kernel(src, dst, line * lineStride, step, length, r);
  }
}
