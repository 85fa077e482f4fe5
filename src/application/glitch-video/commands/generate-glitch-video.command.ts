import type { GenerateGlitchVideoInput } from '../dto/generate-glitch-video.dto.js';

export class GenerateGlitchVideoCommand {
  public readonly payload: GenerateGlitchVideoInput;

  public constructor(payload: GenerateGlitchVideoInput) {
    this.payload = payload;
  }
}
