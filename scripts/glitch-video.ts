#!/usr/bin/env node
import {
  GenerateGlitchVideoCommand,
  GenerateGlitchVideoHandler,
  type GenerationOutcome,
} from '../src/application/glitch-video/index.js';
import {
  CanvasSourceImageLoader,
  FfmpegVideoEncoder,
  GlitchFrameSynthesizer,
  JsonManifestStore,
  PixelGlitchTransform,
} from '../src/infrastructure/glitch-video/index.js';
import { GlitchReelError } from '../src/shared/errors/base.error.js';

import { parseArgs, USAGE } from './glitch-video-args.js';

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.help) {
    console.log(USAGE);
    return;
  }

  const handler = new GenerateGlitchVideoHandler({
    encoder: new FfmpegVideoEncoder(),
    synthesizer: new GlitchFrameSynthesizer(new PixelGlitchTransform()),
    imageLoader: new CanvasSourceImageLoader(),
    createManifestStore: (manifestPath) => new JsonManifestStore(manifestPath),
  });

  const outcome = await handler.execute(new GenerateGlitchVideoCommand(parsed.payload));
  printSummary(outcome);
}

function printSummary(outcome: GenerationOutcome): void {
  const { plan } = outcome;
  console.log(
    `Timing: ${plan.totalDuration}s at ${plan.fps}fps (calm ${plan.calmDuration}s / ${plan.calmFrameCount} frames, ` +
      `climax ${plan.climaxDuration}s / ${plan.climaxFrameCount} frames)`,
  );

  for (const stage of outcome.stages) {
    const status = stage.created ? `built (${stage.reason}, ${stage.durationMs}ms)` : 'cached';
    console.log(`  ${stage.stage.padEnd(14)} ${status}  ${stage.artifact}`);
  }

  console.log(`Output: ${outcome.outputPath}`);
}

main().catch((error: unknown) => {
  if (error instanceof GlitchReelError) {
    console.error(`[glitch-reel] ${error.code}: ${error.message}`);
    const issues = error.metadata.issues;
    if (Array.isArray(issues)) {
      issues.forEach((issue) => console.error(`  ${JSON.stringify(issue)}`));
    }
  } else {
    console.error('[glitch-reel] Generation failed', error);
  }
  process.exitCode = 1;
});
