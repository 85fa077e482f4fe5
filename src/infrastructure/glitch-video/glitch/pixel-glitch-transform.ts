import type { RasterImage, SeededGlitchTransform } from '../../../domain/glitch-video/index.js';
import { cloneRaster } from '../../../domain/glitch-video/index.js';

import { createSeededRandom, randomInt, type RandomSource } from './seeded-random.js';

/** Amounts above this stop growing the offsets; they are accepted, not rejected. */
export const MAX_EFFECTIVE_AMOUNT = 10;

interface GlitchBounds {
  readonly maxOffsetX: number;
  readonly maxOffsetY: number;
  readonly bandShifts: number;
}

/**
 * Horizontal band displacement plus a red/blue channel offset. Offsets grow with the square of
 * the amount, so 0.7 barely shivers while 5 tears a quarter of the width.
 */
export class PixelGlitchTransform implements SeededGlitchTransform {
  public readonly seeded = true;

  public apply(image: RasterImage, amount: number, seed: number): RasterImage {
    const bounds = glitchBounds(image, amount);
    if (bounds.maxOffsetX === 0 && bounds.maxOffsetY === 0) {
      return cloneRaster(image);
    }

    const random = createSeededRandom(seed);
    const shifted = shiftBands(image, bounds, random);
    return offsetChannels(shifted, bounds, random);
  }
}

export function glitchBounds(image: RasterImage, amount: number): GlitchBounds {
  const effective = Number.isFinite(amount) ? Math.min(Math.max(amount, 0), MAX_EFFECTIVE_AMOUNT) : 0;
  const scale = effective ** 2 / 100;

  return {
    maxOffsetX: Math.floor(scale * image.width),
    maxOffsetY: Math.floor(scale * image.height),
    bandShifts: Math.floor(effective * 2),
  };
}

function shiftBands(image: RasterImage, bounds: GlitchBounds, random: RandomSource): RasterImage {
  const result = cloneRaster(image);
  const { width, height } = image;
  const rowBytes = width * 4;
  const maxBand = Math.max(1, Math.floor(height / 4));

  for (let shift = 0; shift < bounds.bandShifts; shift += 1) {
    const startY = randomInt(random, 0, height - 1);
    const bandHeight = Math.min(randomInt(random, 1, maxBand), height - startY);
    const offset = randomInt(random, -bounds.maxOffsetX, bounds.maxOffsetX);
    if (offset === 0) {
      continue;
    }

    const source = new Uint8ClampedArray(result.data.subarray(startY * rowBytes, (startY + bandHeight) * rowBytes));

    for (let y = 0; y < bandHeight; y += 1) {
      const rowStart = (startY + y) * rowBytes;
      for (let x = 0; x < width; x += 1) {
        const sourceX = wrap(x - offset, width);
        const from = y * rowBytes + sourceX * 4;
        const to = rowStart + x * 4;
        result.data[to] = source[from] ?? 0;
        result.data[to + 1] = source[from + 1] ?? 0;
        result.data[to + 2] = source[from + 2] ?? 0;
        result.data[to + 3] = source[from + 3] ?? 255;
      }
    }
  }

  return result;
}

function offsetChannels(image: RasterImage, bounds: GlitchBounds, random: RandomSource): RasterImage {
  const result = cloneRaster(image);
  const { width, height } = image;

  // red, then blue; green stays as the anchor channel
  for (const channel of [0, 2]) {
    const dx = randomInt(random, -bounds.maxOffsetX, bounds.maxOffsetX);
    const dy = randomInt(random, -bounds.maxOffsetY, bounds.maxOffsetY);
    if (dx === 0 && dy === 0) {
      continue;
    }

    for (let y = 0; y < height; y += 1) {
      const sourceY = wrap(y - dy, height);
      for (let x = 0; x < width; x += 1) {
        const sourceX = wrap(x - dx, width);
        result.data[(y * width + x) * 4 + channel] = image.data[(sourceY * width + sourceX) * 4 + channel] ?? 0;
      }
    }
  }

  return result;
}

function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}
