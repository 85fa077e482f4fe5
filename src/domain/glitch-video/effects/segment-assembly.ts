import type { EncoderInput, EncoderJob } from '../contracts/video-encoder.js';
import type { TimingPlan } from '../entities/timing-plan.js';
import { chain, filter, type Filter, type FilterChain, renderGraph } from '../filters/filter-graph.js';
import { formatDecimal } from '../../../shared/media/numberUtils.js';

export interface SegmentAssemblyRequest {
  readonly calmGif: string;
  readonly climaxGif: string;
  readonly outputPath: string;
  readonly plan: TimingPlan;
}

/** Resamples a GIF stream onto a constant `fps` clock and cuts it to `duration` seconds. */
export function retimeFilters(fps: number, duration: number): Filter[] {
  return [
    filter('fps', [fps]),
    filter('setpts', [`N/(${formatDecimal(fps)}*TB)`]),
    filter('trim', [], { duration }),
  ];
}

/**
 * Calm GIF looped forever and trimmed, followed by the climax GIF, no blending between them. A
 * segment of zero seconds is left out of the graph entirely: `trim=duration=0` means "no limit".
 */
export function buildSegmentAssemblyJob(request: SegmentAssemblyRequest): EncoderJob {
  const { plan } = request;
  const segments: { input: EncoderInput; duration: number; label: string }[] = [];

  if (plan.calmDuration > 0) {
    segments.push({ input: { path: request.calmGif, loop: 'infinite' }, duration: plan.calmDuration, label: 'calm' });
  }

  if (plan.climaxDuration > 0) {
    segments.push({
      input: { path: request.climaxGif, loop: 'ignore' },
      duration: plan.climaxDuration,
      label: 'climax',
    });
  }

  const chains: FilterChain[] = [];

  if (segments.length === 1) {
    const [only] = segments;
    if (only) {
      chains.push(chain(['0:v'], retimeFilters(plan.fps, only.duration), ['v']));
    }
  } else {
    segments.forEach((segment, index) => {
      chains.push(chain([`${index}:v`], retimeFilters(plan.fps, segment.duration), [segment.label]));
    });
    chains.push(
      chain(
        segments.map((segment) => segment.label),
        [filter('concat', [], { n: segments.length, v: 1, a: 0 })],
        ['v'],
      ),
    );
  }

  return {
    label: 'assemble',
    inputs: segments.map((segment) => segment.input),
    filterGraph: renderGraph(chains),
    maps: ['[v]'],
    outputPath: request.outputPath,
    frameRate: plan.fps,
    durationCap: plan.totalDuration,
    audio: 'none',
  };
}
