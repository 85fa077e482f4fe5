export type MotionPresetName = 'standard' | 'high';

export interface FrameSize {
  readonly width: number;
  readonly height: number;
}

export interface MotionPreset {
  readonly name: MotionPresetName;
  readonly baseZoom: number;
  readonly zoomAmplitude: number;
  /** Pan amplitudes in pixels at the two X harmonics. */
  readonly xWobble: readonly [number, number];
  readonly yWobble: readonly [number, number];
  /** Radians. */
  readonly rotationMain: number;
  readonly rotationJitter: number;
  readonly preScaleHeight: number;
  readonly overscan: FrameSize;
}

/** Harmonics are shared by every preset; presets differ only in magnitude. */
export const MOTION_HARMONICS = {
  zoom: 1,
  x: [3, 7],
  y: [2, 5],
  rotation: [1, 7],
} as const;

export const OUTPUT_FRAME: FrameSize = { width: 1080, height: 1920 };

export const MOTION_PRESETS: Readonly<Record<MotionPresetName, MotionPreset>> = {
  standard: {
    name: 'standard',
    baseZoom: 1.01,
    zoomAmplitude: 0.01,
    xWobble: [10, 4],
    yWobble: [8, 3],
    rotationMain: 0.006,
    rotationJitter: 0.002,
    preScaleHeight: 2400,
    overscan: { width: 1152, height: 2048 },
  },
  high: {
    name: 'high',
    baseZoom: 1.1,
    zoomAmplitude: 0.08,
    xWobble: [24, 10],
    yWobble: [18, 9],
    rotationMain: 0.012,
    rotationJitter: 0.004,
    preScaleHeight: 2880,
    overscan: { width: 1296, height: 2304 },
  },
};

/**
 * True when a centred `crop` window stays inside `canvas` rotated by up to `maxAngle` radians.
 * The rotate filter grows its canvas to `rotw`/`roth`, so the crop only sees fill colour if the
 * rotated source no longer contains the window.
 */
export function rotationKeepsCropCovered(canvas: FrameSize, crop: FrameSize, maxAngle: number): boolean {
  const angle = Math.abs(maxAngle);
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);

  return (
    crop.width * cos + crop.height * sin <= canvas.width &&
    crop.width * sin + crop.height * cos <= canvas.height
  );
}

export function presetCoversOutput(preset: MotionPreset, crop: FrameSize = OUTPUT_FRAME): boolean {
  return rotationKeepsCropCovered(preset.overscan, crop, preset.rotationMain + preset.rotationJitter);
}
