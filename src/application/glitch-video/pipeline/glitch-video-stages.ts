import {
  type AmplitudeSchedule,
  buildMotionJob,
  buildSegmentAssemblyJob,
  buildTransitionJob,
  type GlitchGifSynthesizer,
  type LoadedSourceImage,
  type MotionPreset,
  type PipelineArtifacts,
  type TimingPlan,
  type TransitionSettings,
  type VideoEncoder,
} from '../../../domain/glitch-video/index.js';

import type { StageDescriptor } from './stage-graph.js';

export interface GlitchVideoStageConfig {
  readonly plan: TimingPlan;
  readonly artifacts: PipelineArtifacts;
  readonly source: LoadedSourceImage;
  readonly calmSchedule: AmplitudeSchedule;
  readonly climaxSchedule: AmplitudeSchedule;
  readonly preset: MotionPreset;
  readonly transitions: TransitionSettings;
}

export interface GlitchVideoStageServices {
  readonly encoder: VideoEncoder;
  readonly synthesizer: GlitchGifSynthesizer;
}

/**
 * calm GIF ─┐
 *           ├─ raw concat ── motion ── transitions
 * climax GIF┘
 */
export function buildGlitchVideoStages(
  config: GlitchVideoStageConfig,
  services: GlitchVideoStageServices,
): StageDescriptor[] {
  const { plan, artifacts, source } = config;

  return [
    {
      name: 'glitch-calm',
      artifact: artifacts.calmGif,
      dependsOn: [],
      parameters: {
        source: source.contentHash,
        frameCount: plan.calmFrameCount,
        delayMs: plan.frameDelayMs,
        schedule: config.calmSchedule,
      },
      produce: async () => {
        await services.synthesizer.synthesizeToGif(
          { image: source.image, frameCount: plan.calmFrameCount, schedule: config.calmSchedule, fps: plan.fps },
          artifacts.calmGif,
        );
      },
    },
    {
      name: 'glitch-climax',
      artifact: artifacts.climaxGif,
      dependsOn: [],
      parameters: {
        source: source.contentHash,
        frameCount: plan.climaxFrameCount,
        delayMs: plan.frameDelayMs,
        schedule: config.climaxSchedule,
      },
      produce: async () => {
        await services.synthesizer.synthesizeToGif(
          { image: source.image, frameCount: plan.climaxFrameCount, schedule: config.climaxSchedule, fps: plan.fps },
          artifacts.climaxGif,
        );
      },
    },
    {
      name: 'assemble',
      artifact: artifacts.rawVideo,
      dependsOn: ['glitch-calm', 'glitch-climax'],
      parameters: {
        fps: plan.fps,
        totalDuration: plan.totalDuration,
        calmDuration: plan.calmDuration,
        climaxDuration: plan.climaxDuration,
      },
      produce: () =>
        services.encoder.encode(
          buildSegmentAssemblyJob({
            calmGif: artifacts.calmGif,
            climaxGif: artifacts.climaxGif,
            outputPath: artifacts.rawVideo,
            plan,
          }),
        ),
    },
    {
      name: 'motion',
      artifact: artifacts.motionVideo,
      dependsOn: ['assemble'],
      parameters: {
        fps: plan.fps,
        totalDuration: plan.totalDuration,
        preset: config.preset,
      },
      produce: () =>
        services.encoder.encode(
          buildMotionJob({
            inputPath: artifacts.rawVideo,
            outputPath: artifacts.motionVideo,
            fps: plan.fps,
            totalDuration: plan.totalDuration,
            preset: config.preset,
          }),
        ),
    },
    {
      name: 'transitions',
      artifact: artifacts.finalVideo,
      dependsOn: ['motion'],
      parameters: {
        fps: plan.fps,
        totalDuration: plan.totalDuration,
        settings: config.transitions,
      },
      produce: () =>
        services.encoder.encode(
          buildTransitionJob({
            inputPath: artifacts.motionVideo,
            outputPath: artifacts.finalVideo,
            fps: plan.fps,
            totalDuration: plan.totalDuration,
            settings: config.transitions,
          }),
        ),
    },
  ];
}
