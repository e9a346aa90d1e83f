/**
 * Configuration module.
 * @module config
 */

export type {
  DynamoDBConfig,
  CredentialsConfig,
  TransferConfig,
  TransferConfigInput,
  CsvHeaderMode,
} from './config.js';
export {
  DynamoDBConfigBuilder,
  isStaticCredentials,
  isProfileCredentials,
  isRoleCredentials,
  isWebIdentityCredentials,
} from './config.js';

export {
  DEFAULT_REGION,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_LOCAL_ENDPOINT,
  createDefaultTransferConfig,
  resolveTransferConfig,
} from './defaults.js';

export { loadConfigFromEnv, loadTransferConfigFromEnv, getEnvNumber, getEnvBoolean } from './environment.js';

export { validateConfig, validateTransferConfig } from './validation.js';
