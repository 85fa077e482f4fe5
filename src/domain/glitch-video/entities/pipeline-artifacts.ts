import path from 'node:path';

export type StageName = 'glitch-calm' | 'glitch-climax' | 'assemble' | 'motion' | 'transitions';

export interface PipelineArtifacts {
  readonly base: string;
  readonly calmGif: string;
  readonly climaxGif: string;
  readonly rawVideo: string;
  readonly motionVideo: string;
  readonly finalVideo: string;
  readonly manifest: string;
}

/**
 * Every artifact of a run is named from one base path, so two runs sharing a base share (and
 * race on) the same files.
 */
export function resolveArtifacts(base: string): PipelineArtifacts {
  const resolved = path.resolve(base);

  return {
    base: resolved,
    calmGif: `${resolved}_glitch1.gif`,
    climaxGif: `${resolved}_glitch2.gif`,
    rawVideo: `${resolved}_raw.mp4`,
    motionVideo: `${resolved}_vfx.mp4`,
    finalVideo: `${resolved}_final.mp4`,
    manifest: `${resolved}_manifest.json`,
  };
}

/** `photos/cat.png` → `photos/cat` */
export function defaultBaseFor(imagePath: string): string {
  const parsed = path.parse(imagePath);
  return path.join(parsed.dir, parsed.name);
}
