export interface TransitionSettings {
  /** Radians. */
  readonly wobbleMain: number;
  readonly wobbleJitter: number;
  /** Hertz. */
  readonly frequency1: number;
  readonly frequency2: number;
  readonly blurSigma: number;
}

/** Length in seconds of the intro and outro windows. */
export const TRANSITION_WINDOW_SECONDS = 0.5;

/** The canvas the transition stage rotates before cropping back to the output frame. */
export const TRANSITION_CANVAS = { width: 1296, height: 2304 } as const;

export const DEFAULT_TRANSITION_SETTINGS: TransitionSettings = {
  wobbleMain: 0.008,
  wobbleJitter: 0.002,
  frequency1: 1,
  frequency2: 1,
  blurSigma: 6,
};
