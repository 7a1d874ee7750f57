/**
 * @module common
 * Common primitive types used across all packages.
 */

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}
