import { ERROR_CODE, type ErrorCode } from './ErrorCode.js';

export type AppErrorOptions = {
  code?: ErrorCode;
  details?: Record<string, unknown>;
  suggestions?: string[];
  retryable?: boolean;
  cause?: unknown;
};

/** Plain-object form of an AppError, safe to JSON.stringify into logs. */
export type AppErrorSummary = {
  name: string;
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestions?: string[];
};

/**
 * Base of every error the client raises. `code` is stable across releases;
 * messages are not.
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly suggestions: string[];
  /** Whether repeating the same call may succeed. The client itself never retries. */
  public readonly retryable: boolean;

  public constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.code = options.code ?? ERROR_CODE.INTERNAL_ERROR;
    this.details = options.details;
    this.suggestions = options.suggestions ?? [];
    this.retryable = options.retryable ?? false;
  }

  public toJSON(): AppErrorSummary {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details ? { details: this.details } : {}),
      ...(this.suggestions.length > 0 ? { suggestions: this.suggestions } : {})
    };
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
