import { promises as fs } from 'node:fs';
import path from 'node:path';

import { applyPalette, GIFEncoder, type GifEncoder, quantize } from 'gifenc';
import { parseGIF } from 'gifuct-js';

import { calculateFrameTimingStats, type FrameTimingStats } from './frameTiming.js';
import { roundToPrecision } from './numberUtils.js';

const DEFAULT_FRAME_DELAY_MS = 100;

export interface GifFrameSource {
  readonly width: number;
  readonly height: number;
  readonly delayMs: number;
  frames(): Iterable<{ readonly data: Uint8ClampedArray }>;
}

export interface GifAnalysis {
  width: number;
  height: number;
  frameCount: number;
  durationMs: number;
  delaysMs: number[];
  timing: FrameTimingStats;
}

export interface GifEncodeOptions {
  /** 0 loops forever. */
  repeat: number;
  /** Palette size per frame, at most 256. */
  maxColors: number;
}

const DEFAULT_ENCODE_OPTIONS: GifEncodeOptions = {
  repeat: 0,
  maxColors: 256,
};

/**
 * Encodes RGBA frames into a looping GIF. Each frame is quantized to its own palette. Frames are
 * pulled one at a time, so the source may be lazy.
 */
export async function encodeGif(
  source: GifFrameSource,
  outputPath: string,
  customOptions: Partial<GifEncodeOptions> = {},
): Promise<number> {
  const options = { ...DEFAULT_ENCODE_OPTIONS, ...customOptions } satisfies GifEncodeOptions;
  const encoder = GIFEncoder();
  let written = 0;

  for (const frame of source.frames()) {
    writeFrame(encoder, frame.data, source, options);
    written += 1;
  }

  encoder.finish();
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, encoder.bytes());

  return written;
}

export async function analyzeGif(input: string | Buffer): Promise<GifAnalysis> {
  const buffer = await loadGifBuffer(input);
  const gif = parseGIF(toArrayBuffer(buffer));
  const delaysMs = readFrameDelays(gif.frames);
  const durationMs = delaysMs.reduce((total, delay) => total + delay, 0);

  return {
    width: gif.lsd.width,
    height: gif.lsd.height,
    frameCount: delaysMs.length,
    durationMs: roundToPrecision(durationMs, 3),
    delaysMs: delaysMs.map((delay) => roundToPrecision(delay, 3)),
    timing: calculateFrameTimingStats(delaysMs),
  };
}

async function loadGifBuffer(input: string | Buffer): Promise<Buffer> {
  if (typeof input === 'string') {
    return fs.readFile(input);
  }

  if (Buffer.isBuffer(input)) {
    return input;
  }

  throw new TypeError('GIF input must be a file path or Buffer');
}

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const arrayBuffer = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(arrayBuffer).set(buffer);
  return arrayBuffer;
}

function writeFrame(
  encoder: GifEncoder,
  rgba: Uint8ClampedArray,
  source: GifFrameSource,
  options: GifEncodeOptions,
): void {
  const palette = quantize(rgba, options.maxColors);
  const index = applyPalette(rgba, palette);
  encoder.writeFrame(index, source.width, source.height, {
    palette,
    delay: source.delayMs,
    repeat: options.repeat,
  });
}

/**
 * Reads delays from the graphic control blocks only. Blocks without an image descriptor
 * (application or comment extensions) are not frames.
 */
function readFrameDelays(frames: readonly unknown[]): number[] {
  const delaysMs: number[] = [];

  for (const frame of frames) {
    if (!isRecord(frame) || !isRecord(frame.image)) {
      continue;
    }
    const control = isRecord(frame.gce) ? frame.gce : undefined;
    const delayCs = typeof control?.delay === 'number' ? control.delay : undefined;
    delaysMs.push(getDelayMs(delayCs === undefined ? undefined : delayCs * 10));
  }

  return delaysMs;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** A zero delay plays at the browser default. */
function getDelayMs(delayMs: number | undefined): number {
  if (delayMs === undefined || delayMs === 0) {
    return DEFAULT_FRAME_DELAY_MS;
  }

  return delayMs;
}
