import { describe, expect, it } from 'vitest';

import { parseEnvironment } from '@/shared/config/env.js';

import { captureError } from '../../../support/errors.js';

describe('parseEnvironment', () => {
  it('fills in defaults', () => {
    expect(parseEnvironment({})).toEqual({ LOG_LEVEL: 'info', GLITCH_REEL_PRESET: 'standard' });
  });

  it('reads an explicit ffmpeg path, log level and preset', () => {
    expect(
      parseEnvironment({ FFMPEG_PATH: '  /opt/ffmpeg/bin/ffmpeg ', LOG_LEVEL: 'debug', GLITCH_REEL_PRESET: 'high' }),
    ).toEqual({ FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg', LOG_LEVEL: 'debug', GLITCH_REEL_PRESET: 'high' });
  });

  it('rejects unknown values', () => {
    expect(captureError(() => parseEnvironment({ LOG_LEVEL: 'loud' }))).toMatchObject({
      code: 'config.invalid-environment',
      kind: 'input',
    });
    expect(captureError(() => parseEnvironment({ GLITCH_REEL_PRESET: 'extreme' }))).toMatchObject({
      code: 'config.invalid-environment',
    });
  });
});
