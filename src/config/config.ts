/**
 * Configuration types for the DynamoDB client and the transfer engine.
 * @module config
 */

import type { RetryConfig } from '../resilience/index.js';

/**
 * Credentials configuration with support for multiple authentication methods.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'profile'; profileName: string }
  | { type: 'role'; roleArn: string; externalId?: string }
  | { type: 'webIdentity'; roleArn: string; tokenFile: string }
  | { type: 'environment' };

/**
 * Connection settings for the DynamoDB client.
 */
export interface DynamoDBConfig {
  /**
   * AWS region where DynamoDB is located.
   * @example 'us-east-1', 'eu-west-1'
   */
  region?: string;

  /**
   * Custom endpoint URL.
   * @example 'http://localhost:8000' for DynamoDB Local
   */
  endpoint?: string;

  credentials?: CredentialsConfig;

  /**
   * Request timeout in milliseconds.
   * @default 5000
   */
  timeout?: number;

  /**
   * Maximum number of sockets in the connection pool.
   */
  maxConnections?: number;
}

export type CsvHeaderMode = 'prescan' | 'first-page';

/**
 * Tuning for copy, export, import and truncate.
 */
export interface TransferConfig {
  /** Items per scan page; defaults to the provider maximum */
  pageSize?: number;
  /** Parallel scan segments */
  segments: number;
  /** Scan segments and batch submits in flight at once */
  maxConcurrency: number;
  /** Extra submit rounds for items a batch write leaves unprocessed */
  maxRetryRounds: number;
  /** Backoff for page fetches */
  scanRetry: RetryConfig;
  /** Backoff for batch submits and between retry rounds */
  writeRetry: RetryConfig;
  /** Abort on the first malformed record instead of recording it */
  strict: boolean;
  /** Failures kept in a summary */
  maxReportedFailures: number;
  /** How the CSV header is collected on export */
  csvHeader: CsvHeaderMode;
}

/**
 * TransferConfig overrides; retry settings may be given partially.
 */
export type TransferConfigInput = Partial<Omit<TransferConfig, 'scanRetry' | 'writeRetry'>> & {
  scanRetry?: Partial<RetryConfig>;
  writeRetry?: Partial<RetryConfig>;
};

export function isStaticCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'static' }> {
  return credentials.type === 'static';
}

export function isProfileCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'profile' }> {
  return credentials.type === 'profile';
}

export function isRoleCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'role' }> {
  return credentials.type === 'role';
}

export function isWebIdentityCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'webIdentity' }> {
  return credentials.type === 'webIdentity';
}

/**
 * Fluent builder for creating DynamoDBConfig objects.
 */
export class DynamoDBConfigBuilder {
  private config: DynamoDBConfig = {};

  withRegion(region: string): this {
    this.config.region = region;
    return this;
  }

  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  withStaticCredentials(accessKeyId: string, secretAccessKey: string, sessionToken?: string): this {
    this.config.credentials = { type: 'static', accessKeyId, secretAccessKey, sessionToken };
    return this;
  }

  withProfileCredentials(profileName: string): this {
    this.config.credentials = { type: 'profile', profileName };
    return this;
  }

  withRoleCredentials(roleArn: string, externalId?: string): this {
    this.config.credentials = { type: 'role', roleArn, externalId };
    return this;
  }

  withWebIdentityCredentials(roleArn: string, tokenFile: string): this {
    this.config.credentials = { type: 'webIdentity', roleArn, tokenFile };
    return this;
  }

  withEnvironmentCredentials(): this {
    this.config.credentials = { type: 'environment' };
    return this;
  }

  withTimeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  withMaxConnections(maxConnections: number): this {
    this.config.maxConnections = maxConnections;
    return this;
  }

  build(): DynamoDBConfig {
    return { ...this.config };
  }

  static from(config: DynamoDBConfig): DynamoDBConfigBuilder {
    const builder = new DynamoDBConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}
