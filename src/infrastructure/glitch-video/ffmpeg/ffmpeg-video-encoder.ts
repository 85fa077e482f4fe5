import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { EncoderInput, EncoderJob, VideoEncoder } from '../../../domain/glitch-video/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { formatDecimal } from '../../../shared/media/numberUtils.js';

import { resolveFfmpegBinary } from './ffmpeg-binary.js';

const STDERR_TAIL_LINES = 20;

export interface FfmpegVideoEncoderOptions {
  readonly binary?: string;
  readonly crf?: number;
  readonly preset?: string;
}

export class FfmpegVideoEncoder implements VideoEncoder {
  private readonly logger = createChildLogger({ module: 'FfmpegVideoEncoder' });

  private readonly options: FfmpegVideoEncoderOptions;

  public constructor(options: FfmpegVideoEncoderOptions = {}) {
    this.options = options;
  }

  /**
   * Encodes into a scratch directory and copies into place only after a clean exit, so the
   * artifact path never holds a truncated file.
   */
  public async encode(job: EncoderJob): Promise<void> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'glitch-reel-'));
    const outputTemp = path.join(workDir, `output${path.extname(job.outputPath) || '.mp4'}`);
    const outputPath = path.resolve(job.outputPath);

    try {
      const args = this.buildArgs(job, outputTemp);
      await this.run(job.label, args);

      try {
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
        await fs.copyFile(outputTemp, outputPath);
      } catch (error) {
        throw AppError.io('encoder.output-copy-failed', error, { stage: job.label, outputPath });
      }
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  public buildArgs(job: EncoderJob, outputPath: string): string[] {
    const args: string[] = ['-hide_banner', '-y'];

    for (const input of job.inputs) {
      args.push(...inputArgs(input));
    }

    args.push('-filter_complex', job.filterGraph);

    for (const map of job.maps) {
      args.push('-map', map);
    }

    args.push('-r', formatDecimal(job.frameRate));

    if (job.durationCap !== undefined) {
      args.push('-t', formatDecimal(job.durationCap, 3));
    }

    args.push('-c:v', 'libx264', '-pix_fmt', 'yuv420p');

    if (this.options.preset) {
      args.push('-preset', this.options.preset);
    }

    if (typeof this.options.crf === 'number') {
      args.push('-crf', `${this.options.crf}`);
    }

    if (job.audio === 'copy') {
      args.push('-c:a', 'copy');
    } else {
      args.push('-an');
    }

    args.push('-movflags', '+faststart', outputPath);
    return args;
  }

  private async run(label: string, args: string[]): Promise<void> {
    const binary = this.options.binary ?? resolveFfmpegBinary();
    this.logger.debug({ stage: label, binary, args }, 'Running ffmpeg');

    await new Promise<void>((resolve, reject) => {
      const proc = spawn(binary, args, { stdio: ['ignore', 'ignore', 'pipe'], windowsHide: true });
      const stderr = new LineTail(STDERR_TAIL_LINES);

      proc.stderr.setEncoding('utf8');
      proc.stderr.on('data', (chunk: string) => {
        stderr.push(chunk);
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          reject(
            AppError.encoding(
              'encoder.binary-not-found',
              'ffmpeg binary not found. Install ffmpeg or set FFMPEG_PATH.',
              { stage: label, binary },
              error,
            ),
          );
          return;
        }
        reject(AppError.encoding('encoder.spawn-failed', error.message, { stage: label, binary }, error));
      });

      proc.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }

        const stderrTail = stderr.toString();
        this.logger.error({ stage: label, code, signal, stderr: stderrTail }, 'ffmpeg failed');
        reject(
          AppError.encoding(
            'encoder.exit-code',
            `ffmpeg exited with code ${code ?? `signal ${signal ?? 'unknown'}`} during ${label}`,
            { stage: label, code, signal, stderr: stderrTail },
          ),
        );
      });
    });
  }
}

function inputArgs(input: EncoderInput): string[] {
  switch (input.loop) {
    case 'infinite': {
      return ['-stream_loop', '-1', '-i', input.path];
    }
    case 'ignore': {
      return ['-ignore_loop', '1', '-i', input.path];
    }
    case 'none': {
      return ['-i', input.path];
    }
    default: {
      const exhaustive: never = input.loop;
      throw AppError.unsupported('encoder.unsupported-loop', 'Unsupported input loop policy', { loop: exhaustive });
    }
  }
}

/**
 * Last `limit` non-empty lines of a text stream. Carriage returns end a line too, so ffmpeg's
 * progress updates roll through the buffer instead of growing one line.
 */
export class LineTail {
  private readonly lines: string[] = [];

  private partial = '';

  public constructor(private readonly limit: number) {}

  public push(text: string): void {
    const parts = (this.partial + text).split(/[\r\n]+/);
    this.partial = parts.pop() ?? '';
    this.lines.push(...parts.filter((line) => line.length > 0));
    if (this.lines.length > this.limit) {
      this.lines.splice(0, this.lines.length - this.limit);
    }
  }

  public toString(): string {
    const lines = this.partial.length > 0 ? [...this.lines, this.partial] : this.lines;
    return lines.slice(-this.limit).join('\n');
  }
}
