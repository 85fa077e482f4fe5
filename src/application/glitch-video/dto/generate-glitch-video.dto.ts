import { z } from 'zod';

import { DEFAULT_TRANSITION_SETTINGS } from '../../../domain/glitch-video/index.js';
import { MOTION_PRESET_NAMES } from '../../../shared/config/env.js';

const finite = () => z.number().finite();

export const transitionSettingsSchema = z.object({
  wobbleMain: finite().default(DEFAULT_TRANSITION_SETTINGS.wobbleMain),
  wobbleJitter: finite().default(DEFAULT_TRANSITION_SETTINGS.wobbleJitter),
  frequency1: finite().default(DEFAULT_TRANSITION_SETTINGS.frequency1),
  frequency2: finite().default(DEFAULT_TRANSITION_SETTINGS.frequency2),
  blurSigma: finite().nonnegative().default(DEFAULT_TRANSITION_SETTINGS.blurSigma),
});

export const glitchAmountsSchema = z.object({
  calmAmount: finite().nonnegative().default(0.7),
  climaxStart: finite().nonnegative().default(3),
  climaxEnd: finite().nonnegative().default(5),
});

export const generateGlitchVideoSchema = z.object({
  imagePath: z.string().trim().min(1),
  totalDuration: finite().positive(),
  fps: z.number().int().positive().max(120).default(60),
  climaxDuration: finite().nonnegative().default(2),
  base: z.string().trim().min(1).optional(),
  outputPath: z.string().trim().min(1).optional(),
  preset: z.enum(MOTION_PRESET_NAMES).optional(),
  transitions: transitionSettingsSchema.default({}),
  glitch: glitchAmountsSchema.default({}),
});

export type GenerateGlitchVideoInput = z.input<typeof generateGlitchVideoSchema>;

export type GenerateGlitchVideoPayload = z.infer<typeof generateGlitchVideoSchema>;
