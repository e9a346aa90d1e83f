/**
 * AWS client construction.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { fromIni, fromTemporaryCredentials, fromTokenFile } from '@aws-sdk/credential-providers';
import type { CredentialsConfig, DynamoDBConfig } from '../config/index.js';
import { DEFAULT_MAX_CONNECTIONS, DEFAULT_REGION, DEFAULT_TIMEOUT, validateConfig } from '../config/index.js';
import { DynamoDBTableService } from '../provider/index.js';
import type { DynamoDBTableServiceOptions } from '../provider/index.js';

const ROLE_SESSION_NAME = 'dynamo-transfer';

/**
 * Builds the SDK client configuration.
 *
 * SDK-level retries are disabled: the scanner and the batch writer run their
 * own retry executors, and stacking both multiplies the attempts.
 */
export function buildClientConfig(config: DynamoDBConfig): DynamoDBClientConfig {
  validateConfig(config);

  const clientConfig: DynamoDBClientConfig = {
    region: config.region ?? DEFAULT_REGION,
    endpoint: config.endpoint,
    maxAttempts: 1,
    requestHandler: {
      requestTimeout: config.timeout ?? DEFAULT_TIMEOUT,
      httpsAgent: { keepAlive: true, maxSockets: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS },
    },
  };

  if (config.credentials) {
    const credentials = resolveCredentials(config.credentials);
    if (credentials) {
      clientConfig.credentials = credentials;
    }
  }

  return clientConfig;
}

function resolveCredentials(credentials: CredentialsConfig): DynamoDBClientConfig['credentials'] {
  switch (credentials.type) {
    case 'static':
      return {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
        sessionToken: credentials.sessionToken,
      };
    case 'profile':
      return fromIni({ profile: credentials.profileName });
    case 'role':
      return fromTemporaryCredentials({
        params: {
          RoleArn: credentials.roleArn,
          ExternalId: credentials.externalId,
          RoleSessionName: ROLE_SESSION_NAME,
        },
      });
    case 'webIdentity':
      return fromTokenFile({ roleArn: credentials.roleArn, webIdentityTokenFile: credentials.tokenFile });
    case 'environment':
      // The SDK's default chain reads the environment
      return undefined;
  }
}

export function createDynamoDBClient(config: DynamoDBConfig): DynamoDBClient {
  return new DynamoDBClient(buildClientConfig(config));
}

/**
 * Creates a table service talking to DynamoDB.
 *
 * @example
 * ```typescript
 * const service = createTableService({ region: 'eu-west-1', credentials: { type: 'profile', profileName: 'ops' } });
 * const engine = new TransferEngine(service);
 * ```
 */
export function createTableService(
  config: DynamoDBConfig,
  options: DynamoDBTableServiceOptions = {}
): DynamoDBTableService {
  return new DynamoDBTableService(createDynamoDBClient(config), options);
}
