/**
 * @module pixel-image
 * Interleaved raster container and per-channel plane access.
 *
 * The blur engine never validates dimensions itself; images built through
 * {@link createPixelImage} are guaranteed to satisfy its preconditions.
 */

import type { ImageDataLike, PixelBuffer, PixelImage } from '@fastgauss/types';
import { InvalidImageError } from './errors';

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidImageError(`${name} must be an integer >= 1, got ${String(value)}`);
  }
}

/**
 * Create a validated pixel image.
 *
 * @param width - Width in pixels.
 * @param height - Height in pixels.
 * @param channels - Interleaved channels per pixel.
 * @param data - Existing samples to wrap (not copied). A zeroed buffer is allocated when omitted.
 * @returns A new PixelImage.
 * @throws {InvalidImageError} On a zero-area image, a non-integer size, or a buffer of the wrong length.
 */
export function createPixelImage(
  width: number,
  height: number,
  channels: number,
  data?: PixelBuffer,
): PixelImage {
  assertDimension('width', width);
  assertDimension('height', height);
  assertDimension('channels', channels);

  const expected = width * height * channels;
  if (data && data.length !== expected) {
    throw new InvalidImageError(
      `Pixel buffer holds ${data.length} samples, expected ${expected} (${width}x${height}x${channels})`,
    );
  }

  return { width, height, channels, data: data ?? new Uint8Array(expected) };
}

/** View canvas-style RGBA image data as a 4-channel image. Shares the buffer. */
export function fromImageData(imageData: ImageDataLike): PixelImage {
  return createPixelImage(imageData.width, imageData.height, 4, imageData.data);
}

/** Deep copy, keeping the buffer's array type. */
export function clonePixelImage(image: PixelImage): PixelImage {
  const data = image.data instanceof Uint8ClampedArray
    ? new Uint8ClampedArray(image.data)
    : new Uint8Array(image.data);
  return { width: image.width, height: image.height, channels: image.channels, data };
}

/**
 * Copy one channel out of the interleaved buffer.
 *
 * @param image - Source image.
 * @param channel - Channel index in `[0, channels)`.
 * @param out - Destination plane of `width * height` samples.
 */
export function extractPlane(image: PixelImage, channel: number, out: PixelBuffer): void {
  const { data, channels } = image;
  const count = image.width * image.height;
  for (let i = 0, si = channel; i < count; i++, si += channels) {
    out[i] = data[si];
  }
}

/** Write one plane back into its channel of the interleaved buffer. */
export function storePlane(image: PixelImage, channel: number, plane: PixelBuffer): void {
  const { data, channels } = image;
  const count = image.width * image.height;
  for (let i = 0, di = channel; i < count; i++, di += channels) {
    data[di] = plane[i];
  }
}
