import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';

import { createCanvas, loadImage } from '@napi-rs/canvas';

import type { LoadedSourceImage, SourceImageLoader } from '../../../domain/glitch-video/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { MemoryCache } from '../cache/memory-cache.js';

interface CanvasSourceImageLoaderOptions {
  readonly cacheEntries?: number;
  readonly cacheTtlMs?: number;
}

const DEFAULT_OPTIONS: Required<CanvasSourceImageLoaderOptions> = {
  cacheEntries: 4,
  cacheTtlMs: 10 * 60 * 1000,
};

/**
 * Decodes PNG/JPEG/GIF/WebP into RGBA through @napi-rs/canvas. Decoded rasters are cached by
 * content hash, so the calm and climax stages decode a source once.
 */
export class CanvasSourceImageLoader implements SourceImageLoader {
  private readonly logger = createChildLogger({ module: 'CanvasSourceImageLoader' });

  private readonly cache: MemoryCache<LoadedSourceImage>;

  public constructor(options: CanvasSourceImageLoaderOptions = {}) {
    const merged = { ...DEFAULT_OPTIONS, ...options };
    this.cache = new MemoryCache<LoadedSourceImage>({
      maxEntries: merged.cacheEntries,
      ttlMs: merged.cacheTtlMs,
    });
  }

  public async load(imagePath: string): Promise<LoadedSourceImage> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(imagePath);
    } catch (error) {
      throw AppError.input('source-image.unreadable', `Cannot read source image ${imagePath}`, {
        imagePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const contentHash = createHash('sha1').update(bytes).digest('hex');
    const cached = this.cache.get(contentHash);
    if (cached) {
      this.logger.debug({ imagePath, contentHash }, 'Reusing decoded source image');
      return cached.value;
    }

    const loaded: LoadedSourceImage = { image: await decodeRgba(bytes, imagePath), contentHash };
    this.cache.set(contentHash, loaded);
    this.logger.info(
      { imagePath, width: loaded.image.width, height: loaded.image.height },
      'Decoded source image',
    );

    return loaded;
  }
}

async function decodeRgba(bytes: Buffer, imagePath: string): Promise<LoadedSourceImage['image']> {
  let decoded: Awaited<ReturnType<typeof loadImage>>;
  try {
    decoded = await loadImage(bytes);
  } catch (error) {
    throw AppError.input('source-image.undecodable', `Cannot decode source image ${imagePath}`, {
      imagePath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const { width, height } = decoded;
  if (width <= 0 || height <= 0) {
    throw AppError.input('source-image.empty', `Source image ${imagePath} has no pixels`, { imagePath });
  }

  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(decoded, 0, 0);
  const imageData = ctx.getImageData(0, 0, width, height);

  return { width, height, data: new Uint8ClampedArray(imageData.data) };
}
