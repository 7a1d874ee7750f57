/**
 * @module pixel-image.test
 * Tests for the interleaved image container and plane access.
 */

import { describe, it, expect } from 'vitest';
import { InvalidImageError } from '../errors';
import {
  clonePixelImage,
  createPixelImage,
  extractPlane,
  fromImageData,
  storePlane,
} from '../pixel-image';

describe('createPixelImage', () => {
  it('allocates a zeroed buffer when none is given', () => {
    const image = createPixelImage(3, 2, 4);
    expect(image.width).toBe(3);
    expect(image.height).toBe(2);
    expect(image.channels).toBe(4);
    expect(image.data).toBeInstanceOf(Uint8Array);
    expect(image.data.length).toBe(24);
    expect(image.data.every((v) => v === 0)).toBe(true);
  });

  it('wraps an existing buffer without copying', () => {
    const data = new Uint8Array(6);
    expect(createPixelImage(2, 1, 3, data).data).toBe(data);
  });

  it.each([
    [0, 1, 1],
    [1, 0, 1],
    [1, 1, 0],
    [1.5, 1, 1],
    [-2, 1, 1],
    [Number.NaN, 1, 1],
  ])('rejects %s x %s x %s', (width, height, channels) => {
    expect(() => createPixelImage(width, height, channels)).toThrow(InvalidImageError);
  });

  it('rejects a buffer of the wrong length', () => {
    expect(() => createPixelImage(2, 2, 3, new Uint8Array(11))).toThrow(
      'Pixel buffer holds 11 samples, expected 12 (2x2x3)',
    );
  });

  it('names the offending dimension', () => {
    expect(() => createPixelImage(4, 0, 1)).toThrow('height must be an integer >= 1, got 0');
  });
});

describe('fromImageData', () => {
  it('views RGBA data as four channels', () => {
    const data = new Uint8ClampedArray(2 * 2 * 4);
    const image = fromImageData({ width: 2, height: 2, data });
    expect(image.channels).toBe(4);
    expect(image.data).toBe(data);
  });
});

describe('clonePixelImage', () => {
  it('copies samples and keeps the array type', () => {
    const source = createPixelImage(1, 2, 1, new Uint8ClampedArray([7, 9]));
    const copy = clonePixelImage(source);
    expect(copy.data).toBeInstanceOf(Uint8ClampedArray);
    expect(copy.data).not.toBe(source.data);
    copy.data[0] = 1;
    expect(source.data[0]).toBe(7);
  });
});

describe('extractPlane / storePlane', () => {
  // 2x2 RGB
  const samples = [
    1, 2, 3, 4, 5, 6,
    7, 8, 9, 10, 11, 12,
  ];

  it('reads one channel in row-major order', () => {
    const image = createPixelImage(2, 2, 3, new Uint8Array(samples));
    const plane = new Uint8Array(4);
    extractPlane(image, 1, plane);
    expect(Array.from(plane)).toEqual([2, 5, 8, 11]);
  });

  it('writes one channel and leaves the others', () => {
    const image = createPixelImage(2, 2, 3, new Uint8Array(samples));
    storePlane(image, 2, new Uint8Array([30, 60, 90, 120]));
    expect(Array.from(image.data)).toEqual([
      1, 2, 30, 4, 5, 60,
      7, 8, 90, 10, 11, 120,
    ]);
  });
});
