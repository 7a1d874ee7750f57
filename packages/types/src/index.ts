/**
 * @fastgauss/types
 *
 * Shared type definitions for fastgauss.
 * This package contains zero runtime code — only TypeScript interfaces
 * and types that serve as the contract between packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Size } from './common';

// Raster images
export type { ImageDataLike, PixelBuffer, PixelImage } from './image';

// Blur
export type { BlurAxis, BoxSpecSequence, GaussianBlurOptions, Radius, RadiusResult } from './blur';
