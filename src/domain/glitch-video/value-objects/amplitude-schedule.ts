/**
 * How glitch intensity varies across a synthesized frame sequence.
 */
export type AmplitudeSchedule =
  | { readonly type: 'constant'; readonly amount: number }
  | { readonly type: 'ramp'; readonly start: number; readonly end: number };

export const AmplitudeSchedule = {
  constant(amount: number): AmplitudeSchedule {
    assertAmount(amount);
    return { type: 'constant', amount };
  },

  ramp(start: number, end: number): AmplitudeSchedule {
    assertAmount(start);
    assertAmount(end);
    return { type: 'ramp', start, end };
  },
} as const;

export function resolveAmplitude(
  schedule: AmplitudeSchedule,
  frameIndex: number,
  frameCount: number,
): number {
  switch (schedule.type) {
    case 'constant': {
      return schedule.amount;
    }
    case 'ramp': {
      if (frameCount < 2) {
        return schedule.start;
      }
      if (frameIndex === frameCount - 1) {
        return schedule.end;
      }
      return schedule.start + (schedule.end - schedule.start) * (frameIndex / (frameCount - 1));
    }
    default: {
      const exhaustive: never = schedule;
      throw new Error(`Unsupported amplitude schedule ${JSON.stringify(exhaustive)}`);
    }
  }
}

function assertAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new RangeError(`Glitch amount must be a non-negative number, received ${amount}`);
  }
}
