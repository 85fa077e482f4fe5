import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';

import { loadEnvironment } from '../../../shared/config/env.js';

/**
 * `FFMPEG_PATH` wins, then the binary bundled by @ffmpeg-installer, then whatever `ffmpeg` is on
 * PATH.
 */
export function resolveFfmpegBinary(): string {
  const configured = loadEnvironment().FFMPEG_PATH;
  if (configured) {
    return configured;
  }

  const bundled = typeof ffmpegInstaller.path === 'string' ? ffmpegInstaller.path.trim() : '';
  return bundled || 'ffmpeg';
}
