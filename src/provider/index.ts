export type { TableService, ProviderLimits, ProviderCapabilities, TableWaitState } from './types.js';
export { DYNAMODB_LIMITS } from './types.js';
export { DynamoDBTableService, toTableDescriptor, toCreateTableInput } from './dynamodb.js';
export type { DynamoDBToken, DynamoDBTableServiceOptions } from './dynamodb.js';
