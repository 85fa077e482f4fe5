import type { RasterImage } from '../value-objects/raster-image.js';

export interface SeededGlitchTransform {
  readonly seeded: true;
  apply(image: RasterImage, amount: number, seed: number): RasterImage;
}

/** Transforms without a seed parameter still work, they are just not reproducible. */
export interface UnseededGlitchTransform {
  readonly seeded: false;
  apply(image: RasterImage, amount: number): RasterImage;
}

/**
 * Single-frame distortion. An amount of 0 leaves the image (nearly) untouched and larger amounts
 * corrupt more; the output always has the input's dimensions.
 */
export type GlitchTransform = SeededGlitchTransform | UnseededGlitchTransform;
