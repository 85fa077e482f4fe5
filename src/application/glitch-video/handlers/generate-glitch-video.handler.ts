import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  AmplitudeSchedule,
  type ArtifactManifestStore,
  defaultBaseFor,
  type GlitchGifSynthesizer,
  MOTION_PRESETS,
  type MotionPresetName,
  type PipelineArtifacts,
  planTimings,
  resolveArtifacts,
  type SourceImageLoader,
  type TimingPlan,
  type VideoEncoder,
} from '../../../domain/glitch-video/index.js';
import { loadEnvironment } from '../../../shared/config/env.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { GenerateGlitchVideoCommand } from '../commands/generate-glitch-video.command.js';
import {
  generateGlitchVideoSchema,
  type GenerateGlitchVideoInput,
  type GenerateGlitchVideoPayload,
} from '../dto/generate-glitch-video.dto.js';
import { buildGlitchVideoStages } from '../pipeline/glitch-video-stages.js';
import { StageGraphRunner, type StageGraphRunnerOptions, type StageReport } from '../pipeline/stage-graph.js';

export interface GenerateGlitchVideoServices {
  readonly encoder: VideoEncoder;
  readonly synthesizer: GlitchGifSynthesizer;
  readonly imageLoader: SourceImageLoader;
  readonly createManifestStore: (manifestPath: string) => ArtifactManifestStore;
  readonly runnerOptions?: StageGraphRunnerOptions;
}

export interface GenerationOutcome {
  readonly plan: TimingPlan;
  readonly artifacts: PipelineArtifacts;
  readonly preset: MotionPresetName;
  readonly stages: readonly StageReport[];
  /** Where the final video was copied to, or the final artifact itself when no copy was asked for. */
  readonly outputPath: string;
}

export class GenerateGlitchVideoHandler {
  private readonly logger = createChildLogger({ module: 'GenerateGlitchVideoHandler' });

  public constructor(private readonly services: GenerateGlitchVideoServices) {}

  public async execute(command: GenerateGlitchVideoCommand): Promise<GenerationOutcome> {
    const payload = this.validate(command.payload);

    try {
      const plan = planTimings(payload.totalDuration, payload.climaxDuration, payload.fps);
      const artifacts = resolveArtifacts(payload.base ?? defaultBaseFor(payload.imagePath));
      const presetName = payload.preset ?? loadEnvironment().GLITCH_REEL_PRESET;

      this.logger.info(
        {
          imagePath: payload.imagePath,
          totalDuration: plan.totalDuration,
          fps: plan.fps,
          calmDuration: plan.calmDuration,
          climaxDuration: plan.climaxDuration,
          calmFrameCount: plan.calmFrameCount,
          climaxFrameCount: plan.climaxFrameCount,
          preset: presetName,
        },
        'Starting glitch video generation',
      );

      const source = await this.services.imageLoader.load(payload.imagePath);
      const stages = buildGlitchVideoStages(
        {
          plan,
          artifacts,
          source,
          calmSchedule: AmplitudeSchedule.constant(payload.glitch.calmAmount),
          climaxSchedule: climaxSchedule(payload),
          preset: MOTION_PRESETS[presetName],
          transitions: payload.transitions,
        },
        this.services,
      );

      const runner = new StageGraphRunner(
        this.services.createManifestStore(artifacts.manifest),
        this.services.runnerOptions,
      );
      const reports = await runner.run(stages);
      const outputPath = await this.deliver(artifacts.finalVideo, payload.outputPath);

      this.logger.info(
        {
          outputPath,
          created: reports.filter((report) => report.created).map((report) => report.stage),
        },
        'Glitch video generation completed',
      );

      return { plan, artifacts, preset: presetName, stages: reports, outputPath };
    } catch (error) {
      this.logger.error({ imagePath: payload.imagePath, error }, 'Glitch video generation failed');
      throw AppError.fromUnknown(error, 'glitch-video.generation-failed');
    }
  }

  /** Copies, never moves: the final artifact stays in place as a cache entry. */
  private async deliver(finalVideo: string, requested: string | undefined): Promise<string> {
    if (!requested) {
      return finalVideo;
    }

    const destination = path.resolve(requested);
    if (destination === finalVideo) {
      return finalVideo;
    }

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.copyFile(finalVideo, destination);
    } catch (error) {
      throw AppError.io('glitch-video.output-copy-failed', error, { finalVideo, destination });
    }

    return destination;
  }

  private validate(payload: GenerateGlitchVideoInput): GenerateGlitchVideoPayload {
    const parsed = generateGlitchVideoSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('glitch-video.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid glitch video payload received');
      throw error;
    }

    return parsed.data;
  }
}

function climaxSchedule(payload: GenerateGlitchVideoPayload): AmplitudeSchedule {
  const { climaxStart, climaxEnd } = payload.glitch;
  return AmplitudeSchedule.ramp(climaxStart, climaxEnd);
}
