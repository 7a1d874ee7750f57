/**
 * @module filters/box-sizes
 * Converts a Gaussian sigma into the box half-widths whose repeated
 * convolution approximates it.
 *
 * @see http://blog.ivank.net/fastest-gaussian-blur.html
 */

import type { BoxSpecSequence, Radius } from '@fastgauss/types';
import { InvalidPassCountError, InvalidRadiusError } from '../errors';
import { isRadius } from './radius';

/** Box passes used when the caller does not ask for another count. */
export const DEFAULT_BOX_PASSES = 3;

/**
 * Compute box half-widths for an `n`-pass Gaussian approximation.
 *
 * The first `m` passes use the narrower odd width `wl`, the rest `wl + 2`,
 * with `m` chosen so the summed variance is closest to `sigma²`.
 * Each index is non-decreasing in `sigma`; `sigma = 0` yields all zeros.
 *
 * @param sigma - Standard deviation of the target Gaussian.
 * @param n - Number of box passes.
 * @returns `n` half-widths in pass order.
 * @throws {InvalidRadiusError} If `sigma` is negative, NaN or infinite.
 * @throws {InvalidPassCountError} If `n` is not an integer >= 1.
 */
export function boxesForGauss(sigma: Radius, n: number = DEFAULT_BOX_PASSES): BoxSpecSequence {
  if (!isRadius(sigma)) throw new InvalidRadiusError(sigma);
  if (!Number.isInteger(n) || n < 1) throw new InvalidPassCountError(n);

  const variance12 = 12 * sigma * sigma;
  const wIdeal = Math.sqrt(variance12 / n + 1);
  let wl = Math.floor(wIdeal);
  if (wl % 2 === 0) wl--;
  const wu = wl + 2;

  const mIdeal = (variance12 - n * wl * wl - 4 * n * wl - 3 * n) / (-4 * wl - 4);
  const m = Math.min(n, Math.max(0, Math.round(mIdeal)));

  const narrow = (wl - 1) / 2;
  const wide = (wu - 1) / 2;
  const sizes: number[] = [];
  for (let i = 0; i < n; i++) {
    sizes.push(i < m ? narrow : wide);
  }
  return sizes;
}
