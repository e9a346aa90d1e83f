import { describe, it, expect } from 'vitest';
import { DynamoDBConfigBuilder } from '../config.js';
import { createDefaultTransferConfig, resolveTransferConfig } from '../defaults.js';
import { loadConfigFromEnv, loadTransferConfigFromEnv } from '../environment.js';
import { validateConfig, validateTransferConfig } from '../validation.js';
import { ConfigurationError } from '../../error/index.js';

describe('DynamoDBConfigBuilder', () => {
  it('should build a config from chained settings', () => {
    const config = new DynamoDBConfigBuilder()
      .withRegion('eu-west-1')
      .withEndpoint('http://localhost:8000')
      .withStaticCredentials('test-key', 'test-secret')
      .withTimeout(1000)
      .build();

    expect(config).toEqual({
      region: 'eu-west-1',
      endpoint: 'http://localhost:8000',
      credentials: { type: 'static', accessKeyId: 'test-key', secretAccessKey: 'test-secret', sessionToken: undefined },
      timeout: 1000,
    });
  });

  it('should copy an existing config', () => {
    const base = { region: 'us-east-1' };
    const config = DynamoDBConfigBuilder.from(base).withProfileCredentials('dev').build();

    expect(config).toEqual({ region: 'us-east-1', credentials: { type: 'profile', profileName: 'dev' } });
    expect(base).toEqual({ region: 'us-east-1' });
  });
});

describe('loadConfigFromEnv', () => {
  it('should fall back to the default region and credential chain', () => {
    expect(loadConfigFromEnv({})).toEqual({ region: 'us-east-1', credentials: { type: 'environment' } });
  });

  it('should prefer web identity over static keys', () => {
    const config = loadConfigFromEnv({
      AWS_REGION: 'ap-southeast-2',
      AWS_ROLE_ARN: 'arn:aws:iam::123456789012:role/test',
      AWS_WEB_IDENTITY_TOKEN_FILE: '/tmp/token',
      AWS_ACCESS_KEY_ID: 'test-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    });

    expect(config.region).toBe('ap-southeast-2');
    expect(config.credentials).toEqual({
      type: 'webIdentity',
      roleArn: 'arn:aws:iam::123456789012:role/test',
      tokenFile: '/tmp/token',
    });
  });

  it('should use the local endpoint when DYNAMODB_LOCAL is set', () => {
    const config = loadConfigFromEnv({ DYNAMODB_LOCAL: 'true', AWS_PROFILE: 'dev', DYNAMODB_TIMEOUT_MS: '2500' });

    expect(config.endpoint).toBe('http://localhost:8000');
    expect(config.credentials).toEqual({ type: 'profile', profileName: 'dev' });
    expect(config.timeout).toBe(2500);
  });
});

describe('transfer config', () => {
  it('should read overrides from the environment', () => {
    expect(
      loadTransferConfigFromEnv({
        TRANSFER_PAGE_SIZE: '100',
        TRANSFER_SEGMENTS: '4',
        TRANSFER_STRICT: '1',
        TRANSFER_CSV_HEADER: 'first-page',
        TRANSFER_MAX_CONCURRENCY: 'many',
      })
    ).toEqual({ pageSize: 100, segments: 4, strict: true, csvHeader: 'first-page' });
  });

  it('should merge partial retry settings over the defaults', () => {
    const config = resolveTransferConfig({ maxConcurrency: 2, writeRetry: { maxAttempts: 3 } });

    expect(config.maxConcurrency).toBe(2);
    expect(config.writeRetry).toEqual({ maxAttempts: 3, baseDelayMs: 50, maxDelayMs: 20000, jitterFactor: 0.5 });
    expect(config.scanRetry).toEqual(createDefaultTransferConfig().scanRetry);
  });
});

describe('validation', () => {
  it('should accept valid configs', () => {
    expect(() => validateConfig({ region: 'us-gov-west-1', endpoint: 'https://dynamodb.example.com' })).not.toThrow();
    expect(() => validateTransferConfig(createDefaultTransferConfig())).not.toThrow();
  });

  it('should reject malformed client settings', () => {
    expect(() => validateConfig({ region: 'moon' })).toThrow(ConfigurationError);
    expect(() => validateConfig({ endpoint: 'ftp://localhost' })).toThrow('Endpoint URL must use http: or https: protocol');
    expect(() => validateConfig({ endpoint: 'not a url' })).toThrow('Invalid endpoint URL: not a url');
    expect(() => validateConfig({ credentials: { type: 'role', roleArn: 'role/test' } })).toThrow(
      'Invalid role ARN format: role/test'
    );
  });

  it('should reject out-of-range transfer settings', () => {
    expect(() => validateTransferConfig(resolveTransferConfig({ maxConcurrency: 0 }))).toThrow(
      'maxConcurrency must be between 1 and 1000, got 0'
    );
    expect(() => validateTransferConfig(resolveTransferConfig({ scanRetry: { baseDelayMs: 500, maxDelayMs: 100 } }))).toThrow(
      'scanRetry.baseDelayMs must be between 0 and 100, got 500'
    );
  });
});
