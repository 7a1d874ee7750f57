/**
 * @module filters
 * Box-filter Gaussian blur.
 *
 * Radius: validated sigma constructors.
 * Planning: sigma to box half-widths.
 * Passes: sliding-window box blur along rows or columns.
 * Engine: per-channel separable blur over interleaved images.
 *
 * @packageDocumentation
 */

export { isRadius, tryRadius, toRadius, unsafeRadius } from './radius';
export { boxesForGauss, DEFAULT_BOX_PASSES } from './box-sizes';
export { boxBlurLine, boxBlurLineFast, boxBlurPass } from './box-blur';
export { gaussianBlur, blur, gaussianBlurred, gaussianBlurImageData } from './gaussian-blur';
