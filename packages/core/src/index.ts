/**
 * @fastgauss/core
 *
 * Linear-time Gaussian blur approximation for interleaved 8-bit images.
 *
 * @packageDocumentation
 */

// Errors
export { InvalidRadiusError, InvalidImageError, InvalidPassCountError } from './errors';

// Image container and plane access
export {
  createPixelImage,
  fromImageData,
  clonePixelImage,
  extractPlane,
  storePlane,
} from './pixel-image';

// Filters
export {
  isRadius,
  tryRadius,
  toRadius,
  unsafeRadius,
  boxesForGauss,
  DEFAULT_BOX_PASSES,
  boxBlurLine,
  boxBlurLineFast,
  boxBlurPass,
  gaussianBlur,
  blur,
  gaussianBlurred,
  gaussianBlurImageData,
} from './filters';
