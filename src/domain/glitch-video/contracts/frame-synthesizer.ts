import type { AmplitudeSchedule } from '../value-objects/amplitude-schedule.js';
import type { RasterImage } from '../value-objects/raster-image.js';

export interface SynthesisRequest {
  readonly image: RasterImage;
  readonly frameCount: number;
  readonly schedule: AmplitudeSchedule;
  readonly fps: number;
}

export interface SynthesizedGif {
  readonly frameCount: number;
  readonly durationMs: number;
}

export interface GlitchGifSynthesizer {
  synthesizeToGif(request: SynthesisRequest, outputPath: string): Promise<SynthesizedGif>;
}
