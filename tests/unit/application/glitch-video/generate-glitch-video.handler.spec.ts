import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  GenerateGlitchVideoCommand,
  type GenerateGlitchVideoInput,
  GenerateGlitchVideoHandler,
  type GenerateGlitchVideoServices,
} from '@/application/glitch-video/index.js';
import {
  createRaster,
  type EncoderJob,
  type SynthesisRequest,
  type SynthesizedGif,
} from '@domain/glitch-video/index.js';
import { JsonManifestStore } from '@/infrastructure/glitch-video/index.js';
import { AppError } from '@/shared/errors/app-error.js';

const writeArtifact = async (filePath: string, body: string): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, body, 'utf8');
};

const createServices = () => {
  const encoder = {
    encode: vi.fn(async (job: EncoderJob) => {
      await writeArtifact(job.outputPath, job.label);
    }),
  };
  const synthesizer = {
    synthesizeToGif: vi.fn(async (request: SynthesisRequest, outputPath: string): Promise<SynthesizedGif> => {
      await writeArtifact(outputPath, `gif:${request.frameCount}`);
      return { frameCount: request.frameCount, durationMs: request.frameCount * 33 };
    }),
  };
  const imageLoader = {
    load: vi.fn(async (_imagePath: string) => ({ image: createRaster(8, 6), contentHash: 'hash-photo' })),
  };
  const services: GenerateGlitchVideoServices = {
    encoder,
    synthesizer,
    imageLoader,
    createManifestStore: (manifestPath) => new JsonManifestStore(manifestPath),
  };

  return { encoder, synthesizer, imageLoader, services };
};

describe('GenerateGlitchVideoHandler', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'glitch-reel-handler-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const payload = (overrides: Partial<GenerateGlitchVideoInput> = {}): GenerateGlitchVideoInput => ({
    imagePath: path.join(dir, 'photo.png'),
    totalDuration: 5,
    climaxDuration: 2,
    fps: 30,
    preset: 'standard',
    ...overrides,
  });

  it('runs every stage and copies the final video to the requested path', async () => {
    const { encoder, synthesizer, imageLoader, services } = createServices();
    const handler = new GenerateGlitchVideoHandler(services);
    const outputPath = path.join(dir, 'out', 'reel.mp4');

    const outcome = await handler.execute(new GenerateGlitchVideoCommand(payload({ outputPath })));

    expect(imageLoader.load).toHaveBeenCalledWith(path.join(dir, 'photo.png'));
    expect(outcome.plan).toMatchObject({ calmDuration: 3, calmFrameCount: 60, climaxFrameCount: 60 });
    expect(outcome.artifacts.base).toBe(path.join(dir, 'photo'));
    expect(outcome.outputPath).toBe(outputPath);
    expect(outcome.stages.map((stage) => [stage.stage, stage.created])).toEqual([
      ['glitch-calm', true],
      ['glitch-climax', true],
      ['assemble', true],
      ['motion', true],
      ['transitions', true],
    ]);

    const [calmRequest] = synthesizer.synthesizeToGif.mock.calls[0] ?? [];
    const [climaxRequest] = synthesizer.synthesizeToGif.mock.calls[1] ?? [];
    expect(calmRequest?.schedule).toEqual({ type: 'constant', amount: 0.7 });
    expect(climaxRequest?.schedule).toEqual({ type: 'ramp', start: 3, end: 5 });

    expect(encoder.encode.mock.calls.map(([job]) => job.label)).toEqual(['assemble', 'motion', 'transitions']);
    expect(encoder.encode.mock.calls.map(([job]) => job.outputPath)).toEqual([
      path.join(dir, 'photo_raw.mp4'),
      path.join(dir, 'photo_vfx.mp4'),
      path.join(dir, 'photo_final.mp4'),
    ]);
    await expect(fs.readFile(outputPath, 'utf8')).resolves.toBe('transitions');
  });

  it('reuses every artifact on an identical second run', async () => {
    const { encoder, synthesizer, services } = createServices();
    const handler = new GenerateGlitchVideoHandler(services);

    await handler.execute(new GenerateGlitchVideoCommand(payload()));
    encoder.encode.mockClear();
    synthesizer.synthesizeToGif.mockClear();

    const outcome = await handler.execute(new GenerateGlitchVideoCommand(payload()));

    expect(outcome.stages.every((stage) => !stage.created)).toBe(true);
    expect(outcome.outputPath).toBe(path.join(dir, 'photo_final.mp4'));
    expect(encoder.encode).not.toHaveBeenCalled();
    expect(synthesizer.synthesizeToGif).not.toHaveBeenCalled();
  });

  it('re-renders only the transitions when their settings change', async () => {
    const { encoder, services } = createServices();
    const handler = new GenerateGlitchVideoHandler(services);

    await handler.execute(new GenerateGlitchVideoCommand(payload()));
    encoder.encode.mockClear();

    await handler.execute(new GenerateGlitchVideoCommand(payload({ transitions: { blurSigma: 3 } })));

    expect(encoder.encode.mock.calls.map(([job]) => job.label)).toEqual(['transitions']);
    expect(encoder.encode.mock.calls[0]?.[0].filterGraph).toContain('gblur=sigma=3:steps=3');
  });

  it('uses the high preset when asked for it', async () => {
    const { encoder, services } = createServices();

    const outcome = await new GenerateGlitchVideoHandler(services).execute(
      new GenerateGlitchVideoCommand(payload({ preset: 'high', base: path.join(dir, 'renders', 'clip') })),
    );

    expect(outcome.preset).toBe('high');
    expect(outcome.artifacts.finalVideo).toBe(path.join(dir, 'renders', 'clip_final.mp4'));
    const motionJob = encoder.encode.mock.calls.find(([job]) => job.label === 'motion')?.[0];
    expect(motionJob?.filterGraph).toContain('scale=-1:2880');
  });

  it('throws validation error when payload is invalid', async () => {
    const { imageLoader, services } = createServices();
    const handler = new GenerateGlitchVideoHandler(services);

    await expect(handler.execute(new GenerateGlitchVideoCommand(payload({ totalDuration: -1 })))).rejects.toMatchObject({
      code: 'glitch-video.invalid-payload',
      kind: 'input',
    });
    expect(imageLoader.load).not.toHaveBeenCalled();
  });

  it('wraps a source image failure without writing artifacts', async () => {
    const { encoder, imageLoader, services } = createServices();
    imageLoader.load.mockRejectedValueOnce(
      AppError.input('source-image.unreadable', 'Cannot read source image photo.png'),
    );
    const handler = new GenerateGlitchVideoHandler(services);

    const error: unknown = await handler.execute(new GenerateGlitchVideoCommand(payload())).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: 'glitch-video.generation-failed',
      kind: 'input',
      message: 'Cannot read source image photo.png',
      metadata: { causeCode: 'source-image.unreadable' },
    });
    expect(encoder.encode).not.toHaveBeenCalled();
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('keeps earlier artifacts when an encoder stage fails', async () => {
    const { encoder, services } = createServices();
    encoder.encode.mockImplementation(async (job: EncoderJob) => {
      if (job.label === 'motion') {
        throw AppError.encoding('encoder.exit-code', 'ffmpeg exited with code 1 during motion', { stage: 'motion' });
      }
      await writeArtifact(job.outputPath, job.label);
    });
    const handler = new GenerateGlitchVideoHandler(services);

    await expect(handler.execute(new GenerateGlitchVideoCommand(payload()))).rejects.toMatchObject({
      code: 'glitch-video.generation-failed',
      kind: 'encoding',
      metadata: { causeCode: 'encoder.exit-code' },
    });
    await expect(fs.readFile(path.join(dir, 'photo_raw.mp4'), 'utf8')).resolves.toBe('assemble');
    await expect(fs.access(path.join(dir, 'photo_final.mp4'))).rejects.toThrow();
  });
});
