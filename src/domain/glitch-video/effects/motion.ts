import type { EncoderJob } from '../contracts/video-encoder.js';
import { affine, add, div, type Expr, periodicSine, sub, variable } from '../filters/expression.js';
import { chain, filter, renderGraph } from '../filters/filter-graph.js';
import { MOTION_HARMONICS, type MotionPreset, OUTPUT_FRAME } from '../value-objects/motion-preset.js';
import { formatDecimal } from '../../../shared/media/numberUtils.js';

export interface MotionExpressions {
  readonly zoom: Expr;
  readonly x: Expr;
  readonly y: Expr;
  readonly angle: Expr;
}

/**
 * Every term has the whole clip as its period, so zoom, pan and sway close their cycle at the
 * last frame no matter where the calm/climax cut falls. zoompan only knows its output frame
 * number, hence `on/fps` as the clock there; rotate gets `t` directly.
 */
export function motionExpressions(fps: number, totalDuration: number, preset: MotionPreset): MotionExpressions {
  const frameTime = div(variable('on'), fps);
  const t = variable('t');
  const [xHarmonic1, xHarmonic2] = MOTION_HARMONICS.x;
  const [yHarmonic1, yHarmonic2] = MOTION_HARMONICS.y;
  const [rotationHarmonic1, rotationHarmonic2] = MOTION_HARMONICS.rotation;

  return {
    zoom: affine(preset.baseZoom, periodicSine(preset.zoomAmplitude, frameTime, totalDuration, MOTION_HARMONICS.zoom)),
    x: affine(
      centeredOffset('iw'),
      periodicSine(preset.xWobble[0], frameTime, totalDuration, xHarmonic1),
      periodicSine(preset.xWobble[1], frameTime, totalDuration, xHarmonic2),
    ),
    y: affine(
      centeredOffset('ih'),
      periodicSine(preset.yWobble[0], frameTime, totalDuration, yHarmonic1),
      periodicSine(preset.yWobble[1], frameTime, totalDuration, yHarmonic2),
    ),
    angle: add(
      periodicSine(preset.rotationMain, t, totalDuration, rotationHarmonic1),
      periodicSine(preset.rotationJitter, t, totalDuration, rotationHarmonic2),
    ),
  };
}

/** `(iw-iw/zoom)/2`: the pan origin that keeps the zoomed window centred. */
function centeredOffset(dimension: 'iw' | 'ih'): Expr {
  const size = variable(dimension);
  return div(sub(size, div(size, variable('zoom'))), 2);
}

export function buildMotionGraph(fps: number, totalDuration: number, preset: MotionPreset): string {
  const expressions = motionExpressions(fps, totalDuration, preset);
  const { overscan } = preset;

  return renderGraph([
    chain(
      ['0:v'],
      [
        filter('fps', [fps]),
        filter('setpts', [`N/(${formatDecimal(fps)}*TB)`]),
        filter('scale', [-1, preset.preScaleHeight]),
        filter('zoompan', [], {
          z: expressions.zoom,
          x: expressions.x,
          y: expressions.y,
          d: 1,
          s: `${overscan.width}x${overscan.height}`,
          fps,
        }),
        filter('rotate', [], { a: expressions.angle, ow: 'rotw(iw)', oh: 'roth(ih)' }),
        filter('crop', [OUTPUT_FRAME.width, OUTPUT_FRAME.height]),
      ],
      ['v'],
    ),
  ]);
}

export interface MotionJobRequest {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly fps: number;
  readonly totalDuration: number;
  readonly preset: MotionPreset;
}

export function buildMotionJob(request: MotionJobRequest): EncoderJob {
  return {
    label: 'motion',
    inputs: [{ path: request.inputPath, loop: 'none' }],
    filterGraph: buildMotionGraph(request.fps, request.totalDuration, request.preset),
    maps: ['[v]'],
    outputPath: request.outputPath,
    frameRate: request.fps,
    audio: 'none',
  };
}
