/**
 * Configuration validation.
 * @module config/validation
 */

import { ConfigurationError } from '../error/index.js';
import type { RetryConfig } from '../resilience/index.js';
import type { CredentialsConfig, DynamoDBConfig, TransferConfig } from './config.js';
import { isProfileCredentials, isRoleCredentials, isStaticCredentials, isWebIdentityCredentials } from './config.js';

/**
 * Validates DynamoDB client configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: DynamoDBConfig): void {
  if (config.region !== undefined) {
    validateRegion(config.region);
  }
  if (config.endpoint !== undefined) {
    validateEndpoint(config.endpoint);
  }
  if (config.credentials !== undefined) {
    validateCredentials(config.credentials);
  }
  if (config.timeout !== undefined) {
    validateRange('Timeout', config.timeout, 0, 300000);
  }
  if (config.maxConnections !== undefined) {
    validateRange('Max connections', config.maxConnections, 1, 1000);
  }
}

/**
 * Validates transfer tuning.
 *
 * @throws {ConfigurationError} If a value is out of range
 */
export function validateTransferConfig(config: TransferConfig): void {
  if (config.pageSize !== undefined) {
    validateRange('pageSize', config.pageSize, 1, 1_000_000);
  }
  validateRange('segments', config.segments, 1, 1_000_000);
  validateRange('maxConcurrency', config.maxConcurrency, 1, 1000);
  validateRange('maxRetryRounds', config.maxRetryRounds, 0, 100);
  validateRange('maxReportedFailures', config.maxReportedFailures, 0, 1_000_000);
  validateRetryConfig('scanRetry', config.scanRetry);
  validateRetryConfig('writeRetry', config.writeRetry);
  if (config.csvHeader !== 'prescan' && config.csvHeader !== 'first-page') {
    throw new ConfigurationError(`csvHeader must be 'prescan' or 'first-page', got '${String(config.csvHeader)}'`);
  }
}

function validateRegion(region: string): void {
  if (region.trim().length === 0) {
    throw new ConfigurationError('Region must be a non-empty string');
  }

  const regionPattern = /^[a-z]{2}(-[a-z]+)+-\d+$/;
  if (!regionPattern.test(region)) {
    throw new ConfigurationError(
      `Invalid region format: ${region}. Expected format like 'us-east-1' or 'eu-west-2'`
    );
  }
}

function validateEndpoint(endpoint: string): void {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigurationError(`Invalid endpoint URL: ${endpoint}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('Endpoint URL must use http: or https: protocol');
  }
}

function validateCredentials(credentials: CredentialsConfig): void {
  if (isStaticCredentials(credentials)) {
    if (credentials.accessKeyId.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty accessKeyId');
    }
    if (credentials.secretAccessKey.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty secretAccessKey');
    }
  } else if (isProfileCredentials(credentials)) {
    if (credentials.profileName.trim().length === 0) {
      throw new ConfigurationError('Profile credentials require non-empty profileName');
    }
  } else if (isRoleCredentials(credentials) || isWebIdentityCredentials(credentials)) {
    if (!credentials.roleArn.startsWith('arn:aws:iam::')) {
      throw new ConfigurationError(`Invalid role ARN format: ${credentials.roleArn}`);
    }
    if (isWebIdentityCredentials(credentials) && credentials.tokenFile.trim().length === 0) {
      throw new ConfigurationError('Web identity credentials require non-empty tokenFile');
    }
  }
}

function validateRetryConfig(name: string, config: RetryConfig): void {
  validateRange(`${name}.maxAttempts`, config.maxAttempts, 1, 100);
  validateRange(`${name}.baseDelayMs`, config.baseDelayMs, 0, config.maxDelayMs);
  validateRange(`${name}.maxDelayMs`, config.maxDelayMs, 0, 3_600_000);
  if (config.jitterFactor !== undefined) {
    validateRange(`${name}.jitterFactor`, config.jitterFactor, 0, 1);
  }
}

function validateRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ConfigurationError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
}
