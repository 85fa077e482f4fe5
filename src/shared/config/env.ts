import { z } from 'zod';

import { AppError } from '../errors/app-error.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const MOTION_PRESET_NAMES = ['standard', 'high'] as const;

const envSchema = z.object({
  FFMPEG_PATH: z
    .string()
    .trim()
    .min(1)
    .optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  GLITCH_REEL_PRESET: z.enum(MOTION_PRESET_NAMES).default('standard'),
});

export type Environment = z.infer<typeof envSchema>;

let cached: Environment | undefined;

export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw AppError.validation('config.invalid-environment', {
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}

export function loadEnvironment(): Environment {
  cached ??= parseEnvironment(process.env);
  return cached;
}
