/**
 * Base error class for everything the transfer engine raises.
 *
 * Carries a stable code, the HTTP status of the failed request when there
 * was one, a retry flag the resilience layer reads, and the SDK error that
 * caused it.
 */
export class DynamoDBError extends Error {
  /**
   * Error code (e.g., 'ProvisionedThroughputExceededException', 'SourceUnavailable')
   */
  public readonly code: string;

  /**
   * HTTP status code associated with the error, if applicable
   */
  public readonly httpStatusCode?: number;

  /**
   * Indicates whether the failed request may be retried
   */
  public readonly isRetryable: boolean;

  /**
   * The underlying error, if this one wraps another
   */
  public readonly originalError?: Error;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: string;
    message: string;
    httpStatusCode?: number;
    isRetryable?: boolean;
    originalError?: Error;
    details?: Record<string, unknown>;
  }) {
    super(options.message);
    this.name = 'DynamoDBError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.isRetryable = options.isRetryable ?? false;
    this.originalError = options.originalError;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    let result = `[${this.code}] ${this.message}`;
    if (this.httpStatusCode) {
      result += ` (HTTP ${this.httpStatusCode})`;
    }
    if (this.isRetryable) {
      result += ' [retryable]';
    }
    return result;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatusCode: this.httpStatusCode,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
