import { AppError } from '../../../shared/errors/app-error.js';
import { frameCountFor, frameDelayMs } from '../../../shared/media/frameTiming.js';

/** The calm segment loops, so only this many seconds of unique calm frames are synthesized. */
export const CALM_SYNTHESIS_CAP_SECONDS = 2;

export interface TimingPlan {
  readonly fps: number;
  readonly totalDuration: number;
  readonly climaxDuration: number;
  readonly calmDuration: number;
  readonly calmFrameCount: number;
  readonly climaxFrameCount: number;
  readonly frameDelayMs: number;
}

export function planTimings(totalDuration: number, climaxDuration: number, fps: number): TimingPlan {
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    throw AppError.input('timing.invalid-duration', 'Total duration must be a positive number of seconds.', {
      totalDuration,
    });
  }

  if (!Number.isFinite(fps) || fps <= 0) {
    throw AppError.input('timing.invalid-fps', 'Frame rate must be a positive number.', { fps });
  }

  if (!Number.isFinite(climaxDuration) || climaxDuration < 0) {
    throw AppError.input('timing.invalid-climax', 'Climax duration cannot be negative.', { climaxDuration });
  }

  const calmDuration = Math.max(0, totalDuration - climaxDuration);
  // A calm segment of zero still gets a full cap of frames; the assembler leaves it out.
  const calmSynthesisSeconds = Math.min(
    calmDuration > 0 ? calmDuration : CALM_SYNTHESIS_CAP_SECONDS,
    CALM_SYNTHESIS_CAP_SECONDS,
  );

  return {
    fps,
    totalDuration,
    climaxDuration,
    calmDuration,
    calmFrameCount: frameCountFor(calmSynthesisSeconds, fps),
    climaxFrameCount: frameCountFor(climaxDuration, fps),
    frameDelayMs: frameDelayMs(fps),
  };
}
