import { DynamoDBError } from './error.js';

// ============================================================================
// Service errors (mapped from AWS SDK failures)
// ============================================================================

/**
 * Error thrown when the client or the engine is misconfigured
 */
export class ConfigurationError extends DynamoDBError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ConfigurationError',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the request is not authenticated or not authorized
 */
export class AuthenticationError extends DynamoDBError {
  constructor(message: string, httpStatusCode?: number, details?: Record<string, unknown>) {
    super({
      code: 'AuthenticationError',
      message,
      httpStatusCode: httpStatusCode ?? 401,
      isRetryable: false,
      details,
    });
    this.name = 'AuthenticationError';
  }
}

export class AccessDeniedError extends AuthenticationError {
  constructor(message: string) {
    super(message, 403);
    this.name = 'AccessDeniedError';
  }
}

/**
 * Error thrown when the service rejects a request as invalid
 */
export class ValidationError extends DynamoDBError {
  constructor(message: string, httpStatusCode?: number, details?: Record<string, unknown>) {
    super({
      code: 'ValidationException',
      message,
      httpStatusCode: httpStatusCode ?? 400,
      isRetryable: false,
      details,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a request is throttled
 */
export class ThroughputError extends DynamoDBError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super({
      code,
      message,
      httpStatusCode: 400,
      isRetryable: true,
      details,
    });
    this.name = 'ThroughputError';
  }
}

export class ProvisionedThroughputExceededError extends ThroughputError {
  constructor(message: string = 'Provisioned throughput exceeded') {
    super(message, 'ProvisionedThroughputExceededException');
    this.name = 'ProvisionedThroughputExceededError';
  }
}

export class RequestLimitExceededError extends ThroughputError {
  constructor(message: string = 'Request rate limit exceeded') {
    super(message, 'RequestLimitExceeded');
    this.name = 'RequestLimitExceededError';
  }
}

export class ThrottlingExceptionError extends ThroughputError {
  constructor(message: string = 'Request throttled') {
    super(message, 'ThrottlingException');
    this.name = 'ThrottlingExceptionError';
  }
}

/**
 * Error thrown for transient service-side failures
 */
export class ServiceError extends DynamoDBError {
  constructor(message: string, code: string, httpStatusCode?: number, details?: Record<string, unknown>) {
    super({
      code,
      message,
      httpStatusCode,
      isRetryable: true,
      details,
    });
    this.name = 'ServiceError';
  }
}

export class InternalServerError extends ServiceError {
  constructor(message: string = 'Internal server error occurred') {
    super(message, 'InternalServerError', 500);
    this.name = 'InternalServerError';
  }
}

export class ServiceUnavailableError extends ServiceError {
  constructor(message: string = 'Service temporarily unavailable') {
    super(message, 'ServiceUnavailable', 503);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Error thrown when a table does not exist
 */
export class TableNotFoundError extends DynamoDBError {
  constructor(tableName: string, originalError?: Error) {
    super({
      code: 'ResourceNotFoundException',
      message: `Table not found: ${tableName}`,
      httpStatusCode: 400,
      isRetryable: false,
      originalError,
      details: { tableName },
    });
    this.name = 'TableNotFoundError';
  }
}

/**
 * Error thrown when a table is being created, updated or deleted
 */
export class ResourceInUseError extends DynamoDBError {
  constructor(message: string, originalError?: Error) {
    super({
      code: 'ResourceInUseException',
      message,
      httpStatusCode: 400,
      isRetryable: false,
      originalError,
    });
    this.name = 'ResourceInUseError';
  }
}

// ============================================================================
// Transfer errors
// ============================================================================

/**
 * Reading from the source table failed after retries were exhausted
 */
export class SourceUnavailableError extends DynamoDBError {
  constructor(tableName: string, attempts: number, cause?: Error) {
    super({
      code: 'SourceUnavailable',
      message: `Source table ${tableName} unavailable after ${attempts} attempt(s)${
        cause ? `: ${cause.message}` : ''
      }`,
      isRetryable: false,
      originalError: cause,
      details: { tableName, attempts },
    });
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Writing to the destination table failed after retries were exhausted
 */
export class DestinationUnavailableError extends DynamoDBError {
  constructor(tableName: string, attempts: number, cause?: Error) {
    super({
      code: 'DestinationUnavailable',
      message: `Destination table ${tableName} unavailable after ${attempts} attempt(s)${
        cause ? `: ${cause.message}` : ''
      }`,
      isRetryable: false,
      originalError: cause,
      details: { tableName, attempts },
    });
    this.name = 'DestinationUnavailableError';
  }
}

/**
 * Source and destination primary keys are incompatible
 */
export class SchemaMismatchError extends DynamoDBError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'SchemaMismatch',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'SchemaMismatchError';
  }
}

/**
 * A value cannot be represented in, or parsed from, a flat format
 */
export class MalformedValueError extends DynamoDBError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'MalformedValue',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'MalformedValueError';
  }
}

/**
 * Filter text could not be parsed
 */
export class InvalidFilterSyntaxError extends DynamoDBError {
  public readonly position: number;

  constructor(message: string, text: string, position: number) {
    super({
      code: 'InvalidFilterSyntax',
      message: `${message} at position ${position} in filter: ${text}`,
      isRetryable: false,
      details: { filter: text, position },
    });
    this.name = 'InvalidFilterSyntaxError';
    this.position = position;
  }
}

/**
 * A transfer finished but some records were permanently rejected
 */
export class PartialFailureError extends DynamoDBError {
  constructor(failed: number, sampleKeys: unknown[]) {
    super({
      code: 'PartialFailure',
      message: `${failed} record(s) failed permanently`,
      isRetryable: false,
      details: { failed, sampleKeys },
    });
    this.name = 'PartialFailureError';
  }
}

/**
 * The operation was cancelled through its AbortSignal
 */
export class OperationCancelledError extends DynamoDBError {
  constructor(message: string = 'Operation cancelled') {
    super({
      code: 'OperationCancelled',
      message,
      isRetryable: false,
    });
    this.name = 'OperationCancelledError';
  }
}
