import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { decompressFrames } from 'gifuct-js';
import { afterEach, describe, expect, test, vi } from 'vitest';

import { analyzeGif, encodeGif, type GifFrameSource } from '@/shared/media/gifToolkit.js';

import { solidRaster } from '../../../support/rasters.js';

vi.mock('gifuct-js', async (importOriginal) => {
  const original = await importOriginal<typeof import('gifuct-js')>();
  return { ...original, decompressFrames: vi.fn(original.decompressFrames) };
});

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

const threeColourSource = (size = 4): GifFrameSource => ({
  width: size,
  height: size,
  delayMs: 40,
  *frames() {
    yield solidRaster(size, size, [255, 0, 0, 255]);
    yield solidRaster(size, size, [0, 255, 0, 255]);
    yield solidRaster(size, size, [0, 0, 255, 255]);
  },
});

describe('gif toolkit', () => {
  test('encodeGif writes every frame and creates the target directory', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'glitch-reel-gif-'));
    tempDirs.push(dir);
    const outputPath = path.join(dir, 'nested', 'loop.gif');

    const written = await encodeGif(threeColourSource(), outputPath);

    expect(written).toBe(3);
    const header = (await fs.readFile(outputPath)).subarray(0, 6).toString('ascii');
    expect(header).toBe('GIF89a');
  });

  test('analyzeGif reads dimensions and frame count from a path or a buffer', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'glitch-reel-gif-'));
    tempDirs.push(dir);
    const outputPath = path.join(dir, 'loop.gif');
    await encodeGif(threeColourSource(), outputPath);

    const fromPath = await analyzeGif(outputPath);
    const fromBuffer = await analyzeGif(await fs.readFile(outputPath));

    expect(fromPath.width).toBe(4);
    expect(fromPath.height).toBe(4);
    expect(fromPath.frameCount).toBe(3);
    expect(fromPath.delaysMs).toEqual([40, 40, 40]);
    expect(fromPath.durationMs).toBe(120);
    expect(fromBuffer).toEqual(fromPath);
  });

  test('analyzeGif reads frame delays without decoding pixels', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'glitch-reel-gif-'));
    tempDirs.push(dir);
    const smallPath = path.join(dir, 'small.gif');
    const largePath = path.join(dir, 'large.gif');
    await encodeGif(threeColourSource(4), smallPath);
    await encodeGif(threeColourSource(400), largePath);

    const small = await analyzeGif(smallPath);
    const large = await analyzeGif(largePath);

    expect(decompressFrames).not.toHaveBeenCalled();
    expect(large.width).toBe(400);
    expect(large.frameCount).toBe(small.frameCount);
    expect(large.delaysMs).toEqual(small.delaysMs);
    expect(large.timing).toEqual(small.timing);
  });
});
