import { type ErrorKind, GlitchReelError } from './base.error.js';

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly kind: ErrorKind;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends GlitchReelError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      kind: options.kind,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
  }

  /**
   * Wraps anything thrown into an AppError. An existing AppError is returned untouched unless a
   * wrapping code is requested, in which case its message and kind are carried over.
   */
  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): AppError {
    if (error instanceof AppError && code === 'UNEXPECTED_ERROR') {
      return error;
    }

    if (error instanceof GlitchReelError) {
      return new AppError({
        code,
        message: error.message,
        kind: error.kind,
        metadata: { ...error.metadata, causeCode: error.code },
        cause: error,
        exposeMessage: error.exposeMessage,
      });
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, kind: 'unexpected', cause, exposeMessage: false });
  }

  public static validation(code: string, metadata: Record<string, unknown>): AppError {
    return new AppError({
      code,
      message: 'Validation failed for the provided payload.',
      kind: 'input',
      metadata,
      exposeMessage: true,
    });
  }

  public static input(code: string, message: string, metadata?: Record<string, unknown>): AppError {
    return new AppError({ code, message, kind: 'input', metadata, exposeMessage: true });
  }

  public static encoding(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
    cause?: unknown,
  ): AppError {
    return new AppError({ code, message, kind: 'encoding', metadata, cause, exposeMessage: false });
  }

  public static io(code: string, error: unknown, metadata?: Record<string, unknown>): AppError {
    const cause = error instanceof Error ? error : new Error(String(error));
    return new AppError({ code, message: cause.message, kind: 'io', metadata, cause, exposeMessage: false });
  }

  public static unsupported(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({
      code,
      message,
      kind: 'unexpected',
      metadata,
      exposeMessage: false,
    });
  }
}
