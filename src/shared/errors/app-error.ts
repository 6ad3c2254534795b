import { TtyScrapeError } from './base.error.js';

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends TtyScrapeError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
  }

  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, cause, exposeMessage: false });
  }

  public static validation(code: string, metadata: Record<string, unknown>): AppError {
    return new AppError({
      code,
      message: 'Validation failed for the provided payload.',
      metadata,
      exposeMessage: true,
    });
  }

  public static configuration(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({ code, message, metadata, exposeMessage: true });
  }

  public static downloadFailed(message: string, cause?: unknown): AppError {
    return new AppError({ code: 'download.failed', message, cause, exposeMessage: true });
  }

  public static unsupportedUrl(url: string, message?: string, cause?: unknown): AppError {
    return new AppError({
      code: 'download.unsupported-url',
      message: message ?? `Unsupported URL: ${url}`,
      metadata: { url },
      cause,
      exposeMessage: true,
    });
  }
}
