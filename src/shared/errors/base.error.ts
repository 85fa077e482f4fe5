export type ErrorKind = 'input' | 'encoding' | 'io' | 'unexpected';

export interface GlitchReelErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly kind?: ErrorKind;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

/**
 * Root of every error raised by the pipeline. `exposeMessage` marks messages that are safe to
 * show to whoever drives the CLI or wraps the pipeline.
 */
export class GlitchReelError extends Error {
  public readonly code: string;

  public readonly kind: ErrorKind;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  public constructor(options: GlitchReelErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.kind = options.kind ?? 'unexpected';
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage ?? false;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      metadata: this.metadata,
    };
  }
}
