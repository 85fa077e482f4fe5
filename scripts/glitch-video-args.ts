import type { GenerateGlitchVideoInput } from '../src/application/glitch-video/index.js';
import type { MotionPresetName } from '../src/domain/glitch-video/index.js';
import { MOTION_PRESET_NAMES } from '../src/shared/config/env.js';
import { AppError } from '../src/shared/errors/app-error.js';

export const USAGE =
  'Usage: glitch-reel <image> <durationSeconds> [--fps 60] [--base PATH] [--out PATH] [--climax 2] ' +
  '[--preset standard|high] [--wobble-main 0.008] [--wobble-jitter 0.002] [--wobble-f1 1] [--wobble-f2 1] [--blur 6]';

export type ParsedArgs = { readonly help: true } | { readonly help: false; readonly payload: GenerateGlitchVideoInput };

type TransitionInput = NonNullable<GenerateGlitchVideoInput['transitions']>;

const VALUE_FLAGS = new Set([
  '--fps',
  '--base',
  '--out',
  '--climax',
  '--preset',
  '--wobble-main',
  '--wobble-jitter',
  '--wobble-f1',
  '--wobble-f2',
  '--blur',
]);

/**
 * Numbers are passed through as parsed (NaN included); range checks belong to the payload
 * schema so the CLI and programmatic callers get the same errors.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      return { help: true };
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    if (!VALUE_FLAGS.has(arg)) {
      throw AppError.input('cli.unknown-argument', `Unknown argument: ${arg}`, { argument: arg });
    }

    const next = argv[i + 1];
    if (next === undefined) {
      throw AppError.input('cli.missing-value', `Missing value for ${arg}`, { argument: arg });
    }

    flags.set(arg, next);
    i += 1;
  }

  const [imagePath, duration, ...extra] = positionals;
  if (imagePath === undefined || duration === undefined || extra.length > 0) {
    throw AppError.input('cli.invalid-arguments', USAGE, { positionals });
  }

  const transitions: TransitionInput = {};
  const wobbleMain = flags.get('--wobble-main');
  const wobbleJitter = flags.get('--wobble-jitter');
  const frequency1 = flags.get('--wobble-f1');
  const frequency2 = flags.get('--wobble-f2');
  const blur = flags.get('--blur');
  if (wobbleMain !== undefined) transitions.wobbleMain = Number.parseFloat(wobbleMain);
  if (wobbleJitter !== undefined) transitions.wobbleJitter = Number.parseFloat(wobbleJitter);
  if (frequency1 !== undefined) transitions.frequency1 = Number.parseFloat(frequency1);
  if (frequency2 !== undefined) transitions.frequency2 = Number.parseFloat(frequency2);
  if (blur !== undefined) transitions.blurSigma = Number.parseFloat(blur);

  const fps = flags.get('--fps');
  const climax = flags.get('--climax');
  const base = flags.get('--base');
  const outputPath = flags.get('--out');
  const preset = parsePreset(flags.get('--preset'));

  return {
    help: false,
    payload: {
      imagePath,
      totalDuration: Number.parseFloat(duration),
      ...(fps !== undefined ? { fps: Number(fps) } : {}),
      ...(climax !== undefined ? { climaxDuration: Number.parseFloat(climax) } : {}),
      ...(base !== undefined ? { base } : {}),
      ...(outputPath !== undefined ? { outputPath } : {}),
      ...(preset !== undefined ? { preset } : {}),
      transitions,
    },
  };
}

function parsePreset(value: string | undefined): MotionPresetName | undefined {
  if (value === undefined) {
    return undefined;
  }

  const preset = MOTION_PRESET_NAMES.find((name) => name === value);
  if (!preset) {
    throw AppError.input('cli.invalid-preset', `Unknown preset "${value}", expected ${MOTION_PRESET_NAMES.join(' or ')}`, {
      preset: value,
    });
  }

  return preset;
}
