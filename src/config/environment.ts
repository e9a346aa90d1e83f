/**
 * Environment variable loading.
 * @module config/environment
 */

import type { CredentialsConfig, DynamoDBConfig, TransferConfig } from './config.js';
import { DEFAULT_LOCAL_ENDPOINT, DEFAULT_REGION } from './defaults.js';

type Env = Record<string, string | undefined>;

/**
 * Loads DynamoDB configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: AWS region
 * - AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_SESSION_TOKEN: static credentials
 * - AWS_PROFILE: shared config profile
 * - AWS_ROLE_ARN, AWS_EXTERNAL_ID: role to assume
 * - AWS_WEB_IDENTITY_TOKEN_FILE: web identity token file (with AWS_ROLE_ARN)
 * - DYNAMODB_ENDPOINT: custom endpoint
 * - DYNAMODB_LOCAL: 'true' to use DynamoDB Local on its default port
 * - DYNAMODB_TIMEOUT_MS, DYNAMODB_MAX_CONNECTIONS
 */
export function loadConfigFromEnv(env: Env = process.env): DynamoDBConfig {
  const config: DynamoDBConfig = {
    region: env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION,
    credentials: loadCredentialsFromEnv(env),
  };

  const endpoint = env.DYNAMODB_ENDPOINT;
  if (endpoint) {
    config.endpoint = endpoint;
  } else if (getEnvBoolean('DYNAMODB_LOCAL', false, env)) {
    config.endpoint = DEFAULT_LOCAL_ENDPOINT;
  }

  const timeout = getEnvNumber('DYNAMODB_TIMEOUT_MS', undefined, env);
  if (timeout !== undefined) {
    config.timeout = timeout;
  }
  const maxConnections = getEnvNumber('DYNAMODB_MAX_CONNECTIONS', undefined, env);
  if (maxConnections !== undefined) {
    config.maxConnections = maxConnections;
  }

  return config;
}

/**
 * Priority order:
 * 1. Web identity (AWS_WEB_IDENTITY_TOKEN_FILE with AWS_ROLE_ARN)
 * 2. Role (AWS_ROLE_ARN)
 * 3. Static keys
 * 4. Profile
 * 5. The SDK's default chain
 */
function loadCredentialsFromEnv(env: Env): CredentialsConfig {
  const webIdentityTokenFile = env.AWS_WEB_IDENTITY_TOKEN_FILE;
  const roleArn = env.AWS_ROLE_ARN;

  if (webIdentityTokenFile && roleArn) {
    return { type: 'webIdentity', roleArn, tokenFile: webIdentityTokenFile };
  }
  if (roleArn) {
    return { type: 'role', roleArn, externalId: env.AWS_EXTERNAL_ID };
  }

  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
  if (accessKeyId && secretAccessKey) {
    return { type: 'static', accessKeyId, secretAccessKey, sessionToken: env.AWS_SESSION_TOKEN };
  }

  if (env.AWS_PROFILE) {
    return { type: 'profile', profileName: env.AWS_PROFILE };
  }

  return { type: 'environment' };
}

/**
 * Reads transfer tuning overrides:
 * TRANSFER_PAGE_SIZE, TRANSFER_SEGMENTS, TRANSFER_MAX_CONCURRENCY,
 * TRANSFER_MAX_RETRY_ROUNDS, TRANSFER_STRICT, TRANSFER_CSV_HEADER.
 */
export function loadTransferConfigFromEnv(env: Env = process.env): Partial<TransferConfig> {
  const config: Partial<TransferConfig> = {};

  const pageSize = getEnvNumber('TRANSFER_PAGE_SIZE', undefined, env);
  if (pageSize !== undefined) {
    config.pageSize = pageSize;
  }
  const segments = getEnvNumber('TRANSFER_SEGMENTS', undefined, env);
  if (segments !== undefined) {
    config.segments = segments;
  }
  const maxConcurrency = getEnvNumber('TRANSFER_MAX_CONCURRENCY', undefined, env);
  if (maxConcurrency !== undefined) {
    config.maxConcurrency = maxConcurrency;
  }
  const maxRetryRounds = getEnvNumber('TRANSFER_MAX_RETRY_ROUNDS', undefined, env);
  if (maxRetryRounds !== undefined) {
    config.maxRetryRounds = maxRetryRounds;
  }
  if (env.TRANSFER_STRICT !== undefined) {
    config.strict = getEnvBoolean('TRANSFER_STRICT', false, env);
  }
  const csvHeader = env.TRANSFER_CSV_HEADER;
  if (csvHeader === 'prescan' || csvHeader === 'first-page') {
    config.csvHeader = csvHeader;
  }

  return config;
}

export function getEnvNumber(key: string, defaultValue?: number, env: Env = process.env): number | undefined {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    return defaultValue;
  }

  return parsed;
}

export function getEnvBoolean(key: string, defaultValue = false, env: Env = process.env): boolean {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }

  return value.toLowerCase() === 'true' || value === '1';
}
