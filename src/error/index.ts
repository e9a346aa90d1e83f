/**
 * Error classes and error handling utilities for transfer operations.
 */

export { DynamoDBError } from './error.js';

export {
  ConfigurationError,
  AuthenticationError,
  AccessDeniedError,
  ValidationError,
  ThroughputError,
  ProvisionedThroughputExceededError,
  RequestLimitExceededError,
  ThrottlingExceptionError,
  ServiceError,
  InternalServerError,
  ServiceUnavailableError,
  TableNotFoundError,
  ResourceInUseError,
  SourceUnavailableError,
  DestinationUnavailableError,
  SchemaMismatchError,
  MalformedValueError,
  InvalidFilterSyntaxError,
  PartialFailureError,
  OperationCancelledError,
} from './categories.js';

export { mapAwsError } from './mapper.js';
export type { ErrorContext } from './mapper.js';
