export type InputLoopPolicy = 'infinite' | 'ignore' | 'none';

export interface EncoderInput {
  readonly path: string;
  readonly loop: InputLoopPolicy;
}

export interface EncoderJob {
  /** Short name used in logs and error metadata. */
  readonly label: string;
  readonly inputs: readonly EncoderInput[];
  readonly filterGraph: string;
  readonly maps: readonly string[];
  readonly outputPath: string;
  readonly frameRate: number;
  readonly durationCap?: number;
  readonly audio: 'copy' | 'none';
}

/**
 * Runs one filter-graph job to completion. Resolves only once the output exists at
 * `job.outputPath`; a failed job leaves nothing there.
 */
export interface VideoEncoder {
  encode(job: EncoderJob): Promise<void>;
}
