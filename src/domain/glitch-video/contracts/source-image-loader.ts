import type { RasterImage } from '../value-objects/raster-image.js';

export interface LoadedSourceImage {
  readonly image: RasterImage;
  /** sha1 of the file bytes, used in stage fingerprints. */
  readonly contentHash: string;
}

export interface SourceImageLoader {
  load(imagePath: string): Promise<LoadedSourceImage>;
}
