import { describe, expect, it } from 'vitest';

import { AmplitudeSchedule, resolveAmplitude } from '@domain/glitch-video/index.js';

const resolveAll = (schedule: AmplitudeSchedule, frameCount: number): number[] =>
  Array.from({ length: frameCount }, (_, index) => resolveAmplitude(schedule, index, frameCount));

describe('AmplitudeSchedule', () => {
  it('returns the same amount for every frame of a constant schedule', () => {
    expect(resolveAll(AmplitudeSchedule.constant(0.7), 4)).toEqual([0.7, 0.7, 0.7, 0.7]);
  });

  it('yields exactly start then end for a two-frame ramp', () => {
    expect(resolveAll(AmplitudeSchedule.ramp(3, 5), 2)).toEqual([3, 5]);
  });

  it('interpolates linearly between start and end', () => {
    const amounts = resolveAll(AmplitudeSchedule.ramp(3, 5), 5);

    expect(amounts[0]).toBe(3);
    expect(amounts[1]).toBeCloseTo(3.5, 10);
    expect(amounts[2]).toBeCloseTo(4, 10);
    expect(amounts[3]).toBeCloseTo(4.5, 10);
    expect(amounts[4]).toBe(5);
  });

  it('lands on the end value exactly on the last frame', () => {
    const schedule = AmplitudeSchedule.ramp(0.1, 0.3);

    expect(resolveAmplitude(schedule, 6, 7)).toBe(0.3);
    expect(resolveAmplitude(schedule, 59, 60)).toBe(0.3);
  });

  it('ramps downwards as well', () => {
    expect(resolveAll(AmplitudeSchedule.ramp(4, 2), 3)).toEqual([4, 3, 2]);
  });

  it('falls back to start for a single frame', () => {
    expect(resolveAmplitude(AmplitudeSchedule.ramp(3, 5), 0, 1)).toBe(3);
  });

  it('rejects negative or non-finite amounts', () => {
    expect(() => AmplitudeSchedule.constant(-0.1)).toThrow(RangeError);
    expect(() => AmplitudeSchedule.ramp(1, Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});
