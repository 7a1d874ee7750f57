/**
 * @module filters/radius
 * Constructors for the validated {@link Radius} type.
 */

import type { Radius, RadiusResult } from '@fastgauss/types';
import { InvalidRadiusError } from '../errors';

function isValidSigma(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/** Runtime guard: finite, non-negative number. */
export function isRadius(value: unknown): value is Radius {
  return typeof value === 'number' && isValidSigma(value);
}

/**
 * Validate a raw sigma without throwing.
 *
 * @example
 * ```ts
 * const result = tryRadius(Number(input));
 * if (!result.ok) return showError(result.error.message);
 * blurImage(image, result.radius);
 * ```
 */
export function tryRadius(value: number): RadiusResult<InvalidRadiusError> {
  if (!isRadius(value)) {
    return { ok: false, error: new InvalidRadiusError(value) };
  }
  return { ok: true, radius: value };
}

/**
 * Validate a raw sigma.
 * @throws {InvalidRadiusError} If `value` is negative, NaN or infinite.
 */
export function toRadius(value: number): Radius {
  const result = tryRadius(value);
  if (!result.ok) throw result.error;
  return result.radius;
}

/**
 * Brand a number as a {@link Radius} WITHOUT checking it.
 *
 * The caller takes over the precondition: `value` must be finite and >= 0.
 * Prefer {@link toRadius} or {@link tryRadius}; this exists for hot loops
 * that already validated the value once.
 */
export function unsafeRadius(value: number): Radius {
  return value as Radius;
}
