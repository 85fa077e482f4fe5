import { describe, expect, it } from 'vitest';

import { planTimings } from '@domain/glitch-video/index.js';
import { AppError } from '@/shared/errors/app-error.js';

import { captureError } from '../../../support/errors.js';

describe('planTimings', () => {
  it('splits a 5s clip with a 2s climax at 30fps', () => {
    expect(planTimings(5, 2, 30)).toEqual({
      fps: 30,
      totalDuration: 5,
      climaxDuration: 2,
      calmDuration: 3,
      calmFrameCount: 60,
      climaxFrameCount: 60,
      frameDelayMs: 33,
    });
  });

  it('synthesizes the full calm duration when it is under the cap', () => {
    const plan = planTimings(2.5, 1, 60);

    expect(plan.calmDuration).toBe(1.5);
    expect(plan.calmFrameCount).toBe(90);
    expect(plan.climaxFrameCount).toBe(60);
    expect(plan.frameDelayMs).toBe(17);
  });

  it('collapses calm to zero when the climax is longer than the clip', () => {
    const plan = planTimings(1, 2, 30);

    expect(plan.calmDuration).toBe(0);
    expect(plan.calmFrameCount).toBe(60);
    expect(plan.climaxFrameCount).toBe(60);
  });

  it('still plans two climax frames when the climax is zero', () => {
    const plan = planTimings(4, 0, 30);

    expect(plan.calmDuration).toBe(4);
    expect(plan.calmFrameCount).toBe(60);
    expect(plan.climaxFrameCount).toBe(2);
  });

  it('keeps calm = max(0, total − climax) for every combination', () => {
    for (const total of [0.2, 1, 2, 3.5, 10]) {
      for (const climax of [0, 0.5, 2, 3.5, 12]) {
        const plan = planTimings(total, climax, 24);
        expect(plan.calmDuration).toBe(Math.max(0, total - climax));
        expect(plan.calmFrameCount).toBeGreaterThanOrEqual(2);
        expect(plan.climaxFrameCount).toBeGreaterThanOrEqual(2);
        expect(plan.calmFrameCount).toBeLessThanOrEqual(48);
      }
    }
  });

  it.each([
    [0, 2, 30, 'timing.invalid-duration'],
    [-1, 2, 30, 'timing.invalid-duration'],
    [Number.NaN, 2, 30, 'timing.invalid-duration'],
    [5, 2, 0, 'timing.invalid-fps'],
    [5, -0.5, 30, 'timing.invalid-climax'],
  ])('rejects total=%s climax=%s fps=%s with %s', (total, climax, fps, code) => {
    const error = captureError(() => planTimings(total, climax, fps));

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code, kind: 'input' });
  });
});
