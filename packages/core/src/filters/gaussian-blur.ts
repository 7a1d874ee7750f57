/**
 * @module filters/gaussian-blur
 * Separable Gaussian blur approximated by repeated box passes.
 *
 * Cost is O(channels * passes * width * height) and does not depend on the
 * radius: every box pass uses a sliding running sum.
 *
 * @see {@link boxesForGauss} for how the radius becomes box widths.
 */

import type { GaussianBlurOptions, ImageDataLike, PixelBuffer, PixelImage, Radius } from '@fastgauss/types';
import { clonePixelImage, extractPlane, fromImageData, storePlane } from '../pixel-image';
import { boxBlurPass } from './box-blur';
import { DEFAULT_BOX_PASSES, boxesForGauss } from './box-sizes';
import { toRadius } from './radius';

/**
 * Front/back plane pair. Every pass reads `front`, writes `back`, then the
 * roles swap, so after an even number of passes `front` is the original
 * buffer again.
 */
class PlaneBuffers {
  front: PixelBuffer;
  back: PixelBuffer;

  constructor(front: PixelBuffer, back: PixelBuffer) {
    this.front = front;
    this.back = back;
  }

  swap(): void {
    const tmp = this.front;
    this.front = this.back;
    this.back = tmp;
  }
}

/**
 * Blur every channel of `image` in place.
 *
 * Box widths are planned before any sample is written, so an invalid
 * radius or pass count leaves the image untouched.
 *
 * @param image - Image to blur; dimensions and channel count are unchanged.
 * @param radius - Standard deviation of the approximated Gaussian.
 * @param options - Pass count and timing.
 * @throws {InvalidRadiusError} If `radius` is negative, NaN or infinite.
 * @throws {InvalidPassCountError} If `options.passes` is not an integer >= 1.
 */
export function gaussianBlur(image: PixelImage, radius: Radius, options: GaussianBlurOptions = {}): void {
  const { passes = DEFAULT_BOX_PASSES, measurePerf = false } = options;
  const boxes = boxesForGauss(radius, passes);
  const start = measurePerf ? performance.now() : 0;

  const { width, height, channels } = image;
  const planeSize = width * height;
  const scratch = new Uint8Array(planeSize);
  // Single-channel images are already planar: blur the buffer directly.
  const plane = channels === 1 ? image.data : new Uint8Array(planeSize);
  const buffers = new PlaneBuffers(plane, scratch);

  for (let c = 0; c < channels; c++) {
    if (channels > 1) extractPlane(image, c, plane);

    for (const r of boxes) {
      boxBlurPass(buffers.front, buffers.back, width, height, r, 'horizontal');
      buffers.swap();
      boxBlurPass(buffers.front, buffers.back, width, height, r, 'vertical');
      buffers.swap();
    }

    if (channels > 1) storePlane(image, c, plane);
  }

  if (measurePerf) {
    const elapsed = performance.now() - start;
    // eslint-disable-next-line no-console
    console.debug(
      `[blur] ${elapsed.toFixed(2)}ms (${width}x${height}x${channels}, sigma=${radius}, boxes=${boxes.join(',')})`,
    );
  }
}

/**
 * Blur `image` in place, validating a raw sigma first.
 *
 * @throws {InvalidRadiusError} If `sigma` is negative, NaN or infinite.
 */
export function blur(image: PixelImage, sigma: number, options?: GaussianBlurOptions): void {
  gaussianBlur(image, toRadius(sigma), options);
}

/**
 * Return a blurred copy of `image`; the input is not modified.
 */
export function gaussianBlurred(image: PixelImage, radius: Radius, options?: GaussianBlurOptions): PixelImage {
  const result = clonePixelImage(image);
  gaussianBlur(result, radius, options);
  return result;
}

/** Blur canvas-style RGBA image data in place. */
export function gaussianBlurImageData(
  imageData: ImageDataLike,
  radius: Radius,
  options?: GaussianBlurOptions,
): void {
  gaussianBlur(fromImageData(imageData), radius, options);
}
