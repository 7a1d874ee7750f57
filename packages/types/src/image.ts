/**
 * @module image
 * Raster image contracts shared by the blur engine and its callers.
 */

/** Byte storage accepted for pixel samples. */
export type PixelBuffer = Uint8Array | Uint8ClampedArray;

/**
 * Interleaved raster with a fixed channel count and one byte per channel.
 * Samples are row-major: `data[(y * width + x) * channels + c]`.
 */
export interface PixelImage {
  /** Width in pixels (>= 1) */
  readonly width: number;
  /** Height in pixels (>= 1) */
  readonly height: number;
  /** Channels per pixel, e.g. 1 (luminance), 3 (RGB), 4 (RGBA) */
  readonly channels: number;
  /** `width * height * channels` samples */
  readonly data: PixelBuffer;
}

/** Structural shape of a canvas `ImageData` (always RGBA). */
export interface ImageDataLike {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}
