import type { EncoderJob } from '../contracts/video-encoder.js';
import { add, between, type Expr, gated, oscillator, variable } from '../filters/expression.js';
import { chain, filter, renderGraph } from '../filters/filter-graph.js';
import { OUTPUT_FRAME } from '../value-objects/motion-preset.js';
import {
  TRANSITION_CANVAS,
  TRANSITION_WINDOW_SECONDS,
  type TransitionSettings,
} from '../value-objects/transition-settings.js';

export interface TransitionExpressions {
  readonly angle: Expr;
  /** Non-zero while the blur is on. */
  readonly blurEnable: Expr;
}

export function transitionWindows(totalDuration: number): [readonly [number, number], readonly [number, number]] {
  const outroStart = Math.max(0, totalDuration - TRANSITION_WINDOW_SECONDS);
  return [
    [0, TRANSITION_WINDOW_SECONDS],
    [outroStart, outroStart + TRANSITION_WINDOW_SECONDS],
  ];
}

export function transitionExpressions(totalDuration: number, settings: TransitionSettings): TransitionExpressions {
  const t = variable('t');
  const windows = transitionWindows(totalDuration);
  const [intro, outro] = windows;

  return {
    angle: gated(
      t,
      windows,
      add(oscillator(settings.wobbleMain, t, settings.frequency1), oscillator(settings.wobbleJitter, t, settings.frequency2)),
    ),
    blurEnable: add(between(t, intro[0], intro[1]), between(t, outro[0], outro[1])),
  };
}

export function buildTransitionGraph(fps: number, totalDuration: number, settings: TransitionSettings): string {
  const expressions = transitionExpressions(totalDuration, settings);

  return renderGraph([
    chain(
      ['0:v'],
      [
        filter('fps', [fps]),
        filter('scale', [TRANSITION_CANVAS.width, TRANSITION_CANVAS.height]),
        filter('rotate', [], { a: expressions.angle, ow: 'rotw(iw)', oh: 'roth(ih)' }),
        filter('gblur', [], { sigma: settings.blurSigma, steps: 3, enable: expressions.blurEnable }),
        filter('crop', [OUTPUT_FRAME.width, OUTPUT_FRAME.height]),
      ],
      ['v'],
    ),
  ]);
}

export interface TransitionJobRequest {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly fps: number;
  readonly totalDuration: number;
  readonly settings: TransitionSettings;
}

export function buildTransitionJob(request: TransitionJobRequest): EncoderJob {
  return {
    label: 'transitions',
    inputs: [{ path: request.inputPath, loop: 'none' }],
    filterGraph: buildTransitionGraph(request.fps, request.totalDuration, request.settings),
    // `?` keeps a missing audio stream from failing the job.
    maps: ['[v]', '0:a?'],
    outputPath: request.outputPath,
    frameRate: request.fps,
    durationCap: request.totalDuration,
    audio: 'copy',
  };
}
