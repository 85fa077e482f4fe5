/** Straight (non-premultiplied) RGBA pixels, row-major, four bytes per pixel. */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export interface FrameSequence {
  readonly width: number;
  readonly height: number;
  readonly frameCount: number;
  readonly delayMs: number;
  readonly amplitudes: readonly number[];
  /** Frames are produced lazily so a long sequence never sits in memory at once. */
  frames(): Generator<RasterImage>;
}

export function createRaster(width: number, height: number): RasterImage {
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

export function cloneRaster(image: RasterImage): RasterImage {
  return { width: image.width, height: image.height, data: new Uint8ClampedArray(image.data) };
}
