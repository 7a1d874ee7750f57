/**
 * @module blur
 * Types for the box-filter Gaussian blur approximation.
 */

declare const radiusBrand: unique symbol;

/**
 * Standard deviation of the target Gaussian, known to be finite and >= 0.
 * Obtain one through the validating constructors in `@fastgauss/core`.
 */
export type Radius = number & { readonly [radiusBrand]: true };

/** Direction a single box pass slides along. */
export type BlurAxis = 'horizontal' | 'vertical';

/**
 * Ordered box half-widths, one per pass. A half-width `r` denotes a
 * window of `2r + 1` samples centered on the output sample.
 */
export type BoxSpecSequence = readonly number[];

/** Per-call blur options. */
export interface GaussianBlurOptions {
  /** Number of box passes approximating the Gaussian (default 3). */
  passes?: number;
  /** Log the call duration through `console.debug` (default false). */
  measurePerf?: boolean;
}

/** Outcome of validating a raw radius without throwing. */
export type RadiusResult<E extends Error = Error> =
  | { readonly ok: true; readonly radius: Radius }
  | { readonly ok: false; readonly error: E };
