/**
 * Error mapping utilities for converting AWS SDK errors to DynamoDBError instances.
 */

import { DynamoDBError } from './error.js';
import {
  AccessDeniedError,
  AuthenticationError,
  ConfigurationError,
  InternalServerError,
  ProvisionedThroughputExceededError,
  RequestLimitExceededError,
  ResourceInUseError,
  ServiceUnavailableError,
  TableNotFoundError,
  ThrottlingExceptionError,
  ValidationError,
} from './categories.js';

/**
 * AWS SDK error shape
 */
interface AwsError extends Error {
  code?: string;
  statusCode?: number;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
  };
  $fault?: 'client' | 'server';
}

function isAwsError(error: unknown): error is AwsError {
  return (
    error instanceof Error &&
    (('code' in error && typeof error.code === 'string') ||
      ('$metadata' in error) ||
      ('$fault' in error))
  );
}

const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN']);

export interface ErrorContext {
  /** Table the failing request was addressed to */
  tableName?: string;
}

/**
 * Maps AWS SDK errors to DynamoDBError instances
 */
export function mapAwsError(error: unknown, context: ErrorContext = {}): DynamoDBError {
  if (error instanceof DynamoDBError) {
    return error;
  }

  if (!isAwsError(error)) {
    return new DynamoDBError({
      code: 'UnknownError',
      message: error instanceof Error ? error.message : String(error),
      isRetryable: false,
      originalError: error instanceof Error ? error : undefined,
    });
  }

  const errorCode = error.code || error.name || 'UnknownError';
  const message = error.message;
  const httpStatusCode = error.$metadata?.httpStatusCode ?? error.statusCode;

  switch (errorCode) {
    case 'ConfigurationException':
      return new ConfigurationError(message);

    case 'AccessDeniedException':
    case 'UnauthorizedException':
      return new AccessDeniedError(message);

    case 'UnrecognizedClientException':
    case 'InvalidSignatureException':
    case 'SignatureDoesNotMatchException':
    case 'ExpiredTokenException':
    case 'MissingAuthenticationTokenException':
      return new AuthenticationError(message, httpStatusCode);

    case 'ValidationException':
    case 'SerializationException':
      return new ValidationError(message, httpStatusCode);

    case 'ProvisionedThroughputExceededException':
      return new ProvisionedThroughputExceededError(message);

    case 'RequestLimitExceeded':
      return new RequestLimitExceededError(message);

    case 'ThrottlingException':
      return new ThrottlingExceptionError(message);

    case 'InternalServerError':
    case 'InternalFailure':
      return new InternalServerError(message);

    case 'ServiceUnavailable':
    case 'ServiceUnavailableException':
      return new ServiceUnavailableError(message);

    case 'ResourceNotFoundException':
    case 'TableNotFoundException':
      return new TableNotFoundError(context.tableName ?? extractTableName(message), error);

    case 'ResourceInUseException':
      return new ResourceInUseError(message, error);

    case 'RequestTimeout':
    case 'RequestTimeoutException':
    case 'TimeoutError':
      return new DynamoDBError({
        code: errorCode,
        message: message || 'Request timeout',
        httpStatusCode: 408,
        isRetryable: true,
        originalError: error,
      });

    default:
      return mapByStatusOrFault(error, errorCode, message, httpStatusCode);
  }
}

function mapByStatusOrFault(
  error: AwsError,
  errorCode: string,
  message: string,
  httpStatusCode?: number
): DynamoDBError {
  if (httpStatusCode) {
    switch (httpStatusCode) {
      case 400:
        return new ValidationError(message, httpStatusCode);
      case 401:
        return new AuthenticationError(message, httpStatusCode);
      case 403:
        return new AccessDeniedError(message);
      case 408:
      case 429:
        return new DynamoDBError({
          code: errorCode,
          message,
          httpStatusCode,
          isRetryable: true,
          originalError: error,
        });
      case 500:
        return new InternalServerError(message);
      case 503:
        return new ServiceUnavailableError(message);
    }
  }

  return new DynamoDBError({
    code: errorCode,
    message: message || 'An error occurred',
    httpStatusCode,
    isRetryable:
      error.$fault === 'server' ||
      (httpStatusCode !== undefined && httpStatusCode >= 500) ||
      NETWORK_ERROR_CODES.has(errorCode),
    originalError: error,
  });
}

function extractTableName(message: string): string {
  const match = message.match(/table[:\s]+['"]?([a-zA-Z0-9_.-]+)['"]?/i);
  return match?.[1] ?? 'unknown';
}
