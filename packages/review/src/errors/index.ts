import { ReviewErrorCode } from './codes.js';

export { ReviewErrorCode } from './codes.js';

/**
 * Base error class for every failure the review run reports
 */
export class PrCriticError extends Error {
  constructor(
    message: string,
    public readonly code: ReviewErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'PrCriticError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

/**
 * Missing or malformed action input. Raised before any network call.
 */
export class InputError extends PrCriticError {
  constructor(
    message: string,
    public readonly fields: string[],
  ) {
    super(message, ReviewErrorCode.INVALID_INPUT, { fields });
    this.name = 'InputError';
  }
}

/**
 * Unreadable or invalid review.yml
 */
export class ConfigError extends PrCriticError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ReviewErrorCode.CONFIG_INVALID, context);
    this.name = 'ConfigError';
  }
}

/**
 * Failure talking to the review API
 */
export class ReviewApiError extends PrCriticError {
  readonly status?: number;

  constructor(
    message: string,
    opts: { code?: ReviewErrorCode; status?: number; retryable?: boolean } = {},
  ) {
    super(
      message,
      opts.code ?? ReviewErrorCode.REVIEW_API_FAILED,
      opts.status !== undefined ? { status: opts.status } : undefined,
      opts.retryable ?? false,
    );
    this.name = 'ReviewApiError';
    this.status = opts.status;
  }

  /**
   * Classify a non-2xx answer. 429 and 5xx are worth retrying, 401/403 mean the cookie was rejected.
   */
  static fromStatus(status: number, body: string): ReviewApiError {
    const excerpt = body.trim().slice(0, 500);
    if (status === 401 || status === 403) {
      return new ReviewApiError(
        `Review API rejected the service cookie (${status}): ${excerpt}`,
        { code: ReviewErrorCode.AUTH_FAILED, status },
      );
    }
    return new ReviewApiError(`Review API error (${status}): ${excerpt}`, {
      status,
      retryable: status === 429 || status >= 500,
    });
  }
}

/**
 * Failure talking to GitHub (missing PR, bad token, rate limit, ...)
 */
export class GitHubApiError extends PrCriticError {
  constructor(
    message: string,
    code: ReviewErrorCode = ReviewErrorCode.GITHUB_API_FAILED,
    public readonly status?: number,
  ) {
    super(message, code, status !== undefined ? { status } : undefined);
    this.name = 'GitHubApiError';
  }
}

/**
 * Type guard for errors raised by this package
 */
export function isPrCriticError(error: unknown): error is PrCriticError {
  return error instanceof PrCriticError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}
