import {
  type FrameSequence,
  type GlitchGifSynthesizer,
  type GlitchTransform,
  type RasterImage,
  resolveAmplitude,
  type SynthesisRequest,
} from '../../../domain/glitch-video/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { frameDelayMs } from '../../../shared/media/frameTiming.js';
import { analyzeGif, encodeGif, type GifAnalysis } from '../../../shared/media/gifToolkit.js';

const MIN_FRAMES = 2;

const VERBOSE_FRAME_LIMIT = 120;

const PROGRESS_LINES = 60;

export class GlitchFrameSynthesizer implements GlitchGifSynthesizer {
  private readonly logger = createChildLogger({ module: 'GlitchFrameSynthesizer' });

  private warnedAboutSeed = false;

  public constructor(private readonly transform: GlitchTransform) {}

  /**
   * Frame `i` is distorted with the schedule's amount at `i` and seed `i`, so a sequence is
   * reproducible and progresses instead of flickering between unrelated noise.
   */
  public synthesize(request: SynthesisRequest): FrameSequence {
    const { image, schedule } = request;
    const frameCount = Math.max(MIN_FRAMES, Math.floor(request.frameCount));
    const amplitudes = Array.from({ length: frameCount }, (_, index) => resolveAmplitude(schedule, index, frameCount));
    const progressEvery = frameCount <= VERBOSE_FRAME_LIMIT ? 1 : Math.max(1, Math.floor(frameCount / PROGRESS_LINES));
    const glitchFrame = (frame: RasterImage, amount: number, seed: number): RasterImage => this.glitch(frame, amount, seed);
    const logger = this.logger;

    return {
      width: image.width,
      height: image.height,
      frameCount,
      delayMs: frameDelayMs(request.fps),
      amplitudes,
      *frames() {
        for (const [index, amount] of amplitudes.entries()) {
          const frame = glitchFrame(image, amount, index);
          if (frame.width !== image.width || frame.height !== image.height) {
            throw AppError.unsupported('glitch.dimension-mismatch', 'Glitch transform changed the frame size', {
              expected: { width: image.width, height: image.height },
              received: { width: frame.width, height: frame.height },
            });
          }
          if (index % progressEvery === 0) {
            logger.debug({ frame: index + 1, frameCount, amount: Number(amount.toFixed(3)) }, 'Glitched frame');
          }
          yield frame;
        }
      },
    };
  }

  public async synthesizeToGif(request: SynthesisRequest, outputPath: string): Promise<GifAnalysis> {
    const sequence = this.synthesize(request);

    this.logger.info(
      {
        outputPath,
        frameCount: sequence.frameCount,
        delayMs: sequence.delayMs,
        schedule: request.schedule,
      },
      'Synthesizing glitch frames',
    );

    try {
      await encodeGif(sequence, outputPath);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw AppError.io('glitch.gif-write-failed', error, { outputPath });
    }

    const analysis = await analyzeGif(outputPath);
    this.logger.info(
      { outputPath, frameCount: analysis.frameCount, durationMs: analysis.durationMs, fps: analysis.timing.fps },
      'Wrote glitch GIF',
    );

    return analysis;
  }

  private glitch(frame: RasterImage, amount: number, seed: number): RasterImage {
    if (this.transform.seeded) {
      return this.transform.apply(frame, amount, seed);
    }

    if (!this.warnedAboutSeed) {
      this.warnedAboutSeed = true;
      this.logger.warn('Glitch transform takes no seed; frames will not be reproducible');
    }
    return this.transform.apply(frame, amount);
  }
}
