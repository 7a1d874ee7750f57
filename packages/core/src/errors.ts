/**
 * @module errors
 * Error types thrown by the blur pipeline.
 * Every check runs before the pixel buffer is touched.
 */

/** Thrown when a blur radius is negative, NaN or infinite. */
export class InvalidRadiusError extends Error {
  /** The rejected value. */
  readonly value: number;

  constructor(value: number) {
    super(`Blur radius must be a finite number >= 0, got ${String(value)}`);
    this.name = 'InvalidRadiusError';
    this.value = value;
  }
}

/** Thrown when image dimensions or buffer length are inconsistent. */
export class InvalidImageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidImageError';
  }
}

/** Thrown when the box pass count is not a positive integer. */
export class InvalidPassCountError extends Error {
  constructor(passes: number) {
    super(`Box pass count must be an integer >= 1, got ${String(passes)}`);
    this.name = 'InvalidPassCountError';
  }
}
