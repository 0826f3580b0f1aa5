/** Subclasses fix `statusCode` and `code`; callers add context. */
export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  isOperational?: boolean;
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base of every error raised on purpose. `code` is what clients see and what a
 * failed document records. Errors with `isOperational: false` (bad
 * configuration, a broken invariant) are not the caller's fault and are
 * reported without their message.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly isOperational: boolean;
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;

  constructor(options: AppErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.isOperational = options.isOperational ?? true;
    this.requestId = options.requestId;
    this.details = options.details;
    Error.captureStackTrace(this, new.target);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
