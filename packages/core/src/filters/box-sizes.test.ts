import { describe, expect, it } from 'vitest';
import { InvalidPassCountError, InvalidRadiusError } from '../errors';
import { boxesForGauss, DEFAULT_BOX_PASSES } from './box-sizes';
import { toRadius, unsafeRadius } from './radius';

describe('boxesForGauss', () => {
  it('defaults to three passes', () => {
    expect(DEFAULT_BOX_PASSES).toBe(3);
    expect(boxesForGauss(toRadius(4))).toHaveLength(3);
  });

  it('yields identity boxes for sigma 0', () => {
    expect(boxesForGauss(toRadius(0))).toEqual([0, 0, 0]);
    expect(boxesForGauss(toRadius(0), 1)).toEqual([0]);
    expect(boxesForGauss(toRadius(0), 5)).toEqual([0, 0, 0, 0, 0]);
  });

  it.each([
    [0.5, [0, 0, 0]],
    [1, [0, 0, 1]],
    [2, [1, 1, 2]],
    [3, [2, 2, 3]],
    [10, [9, 9, 10]],
    [15, [14, 14, 15]],
  ])('plans sigma %s as %j', (sigma, expected) => {
    expect(boxesForGauss(toRadius(sigma))).toEqual(expected);
  });

  it('is non-decreasing per pass as sigma grows', () => {
    for (const n of [1, 2, 3, 4]) {
      let previous = boxesForGauss(toRadius(0), n);
      for (let sigma = 0.05; sigma <= 60; sigma += 0.05) {
        const current = boxesForGauss(toRadius(sigma), n);
        for (let i = 0; i < n; i++) {
          expect(current[i]).toBeGreaterThanOrEqual(previous[i]);
        }
        previous = current;
      }
    }
  });

  it('returns non-negative integer half-widths, narrow ones first', () => {
    for (let sigma = 0; sigma <= 30; sigma += 0.37) {
      const boxes = boxesForGauss(toRadius(sigma));
      for (const r of boxes) {
        expect(Number.isInteger(r)).toBe(true);
        expect(r).toBeGreaterThanOrEqual(0);
      }
      expect(boxes[0]).toBeLessThanOrEqual(boxes[2]);
      expect(boxes[2] - boxes[0]).toBeLessThanOrEqual(1);
    }
  });

  it('matches the target variance within one width step', () => {
    for (let sigma = 5; sigma <= 50; sigma += 0.5) {
      const boxes = boxesForGauss(toRadius(sigma));
      // A box of width w has variance (w^2 - 1) / 12.
      const variance = boxes.reduce((acc, r) => acc + ((2 * r + 1) ** 2 - 1) / 12, 0);
      expect(Math.abs(variance - sigma * sigma) / (sigma * sigma)).toBeLessThan(0.1);
    }
  });

  it('rejects an unchecked invalid sigma', () => {
    expect(() => boxesForGauss(unsafeRadius(-1))).toThrow(InvalidRadiusError);
    expect(() => boxesForGauss(unsafeRadius(Number.NaN))).toThrow(InvalidRadiusError);
  });

  it.each([0, -1, 2.5, Number.NaN])('rejects pass count %s', (n) => {
    expect(() => boxesForGauss(toRadius(1), n)).toThrow(InvalidPassCountError);
  });
});
