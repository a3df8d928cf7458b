export type ReviewErrorKind =
  | 'ConfigurationError'
  | 'FetchError'
  | 'EmptyDiffError'
  | 'UpstreamError'
  | 'PostError';

/** Base class for every failure the review flow reports. */
export abstract class ReviewError extends Error {
  abstract readonly kind: ReviewErrorKind;
  readonly retryable: boolean;
  readonly context: Record<string, unknown>;

  protected constructor(
    message: string,
    options: {
      retryable?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.kind,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

export class ConfigurationError extends ReviewError {
  readonly kind = 'ConfigurationError';
  readonly name = 'ConfigurationError';

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { context });
  }
}

export class FetchError extends ReviewError {
  readonly kind = 'FetchError';
  readonly name = 'FetchError';

  constructor(
    message: string,
    context: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, { context, cause });
  }
}

export class EmptyDiffError extends ReviewError {
  readonly kind = 'EmptyDiffError';
  readonly name = 'EmptyDiffError';
  /** Files that were present but excluded from review. */
  readonly excludedFiles: string[];

  constructor(
    message = 'No reviewable changes found in the diff',
    excludedFiles: string[] = [],
  ) {
    super(message, { context: { excludedFiles } });
    this.excludedFiles = excludedFiles;
  }
}

export type UpstreamFailureReason =
  | 'timeout'
  | 'network'
  | 'rate_limited'
  | 'server_error'
  | 'client_error'
  | 'invalid_response';

export class UpstreamError extends ReviewError {
  readonly kind = 'UpstreamError';
  readonly name = 'UpstreamError';
  readonly reason: UpstreamFailureReason;
  readonly status?: number;

  constructor(
    message: string,
    reason: UpstreamFailureReason,
    options: { status?: number; cause?: unknown; provider?: string } = {},
  ) {
    super(message, {
      retryable: isRetryableReason(reason),
      context: {
        reason,
        status: options.status,
        provider: options.provider,
      },
      cause: options.cause,
    });
    this.reason = reason;
    this.status = options.status;
  }

  /** Maps an HTTP status code to the failure reason it represents. */
  static reasonForStatus(status: number): UpstreamFailureReason {
    if (status === 408) {
      return 'timeout';
    }
    if (status === 429) {
      return 'rate_limited';
    }
    if (status >= 500) {
      return 'server_error';
    }
    return 'client_error';
  }
}

export class PostError extends ReviewError {
  readonly kind = 'PostError';
  readonly name = 'PostError';

  constructor(
    message: string,
    context: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, { context, cause });
  }
}

function isRetryableReason(reason: UpstreamFailureReason): boolean {
  return (
    reason === 'timeout' ||
    reason === 'network' ||
    reason === 'rate_limited' ||
    reason === 'server_error'
  );
}

export function isReviewError(error: unknown): error is ReviewError {
  return error instanceof ReviewError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
